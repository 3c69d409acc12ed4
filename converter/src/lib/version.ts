export const APP_NAME = 'geojson-geoparquet';
export const VERSION = '0.1.0';
