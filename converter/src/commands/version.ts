import { APP_NAME, VERSION } from '../lib/version';

/**
 * Print version information
 */
export function runVersion(): number {
  console.log(`${APP_NAME} version ${VERSION}`);
  console.log(`  Node.js ${process.version}, ${process.platform}/${process.arch}`);
  return 0;
}
