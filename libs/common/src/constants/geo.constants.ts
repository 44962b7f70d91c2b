export const EARTH_RADIUS_METERS = 6371000;

export const LATITUDE_LIMIT = 90;
export const LONGITUDE_LIMIT = 180;
