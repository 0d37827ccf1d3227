// Environment configuration
import * as dotenv from 'dotenv';

dotenv.config();

// Server
export const PORT = parseInt(process.env.PORT || '3001', 10);
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const JSON_BODY_LIMIT = process.env.JSON_BODY_LIMIT || '50mb';

// Database (PostgreSQL)
export const DB_HOST = process.env.DB_HOST || 'localhost';
export const DB_PORT = parseInt(process.env.DB_PORT || '5432', 10);
export const DB_USERNAME = process.env.DB_USERNAME || 'postgres';
export const DB_PASSWORD = process.env.DB_PASSWORD || 'postgres';
export const DB_DATABASE = process.env.DB_DATABASE || 'ride_analyzer';
export const DB_LOGGING = process.env.DB_LOGGING === 'true';

// Geonames (gazetteer)
export const GEONAMES_BASE_URL =
  process.env.GEONAMES_BASE_URL || 'https://download.geonames.org/export/dump/';
export const GEONAMES_DIR = process.env.GEONAMES_DIR || './data/geonames';
export const GEONAMES_TIMEOUT_MS = parseInt(
  process.env.GEONAMES_TIMEOUT_MS || '60000',
  10,
); // 1 minuto por país
export const GEONAMES_FORCE_DOWNLOAD =
  process.env.GEONAMES_FORCE_DOWNLOAD === 'true';

// Lista de países separada por comas (ej: "GB,FR"). Vacía = geocoding deshabilitado
export const GEOCODING_COUNTRIES = (process.env.GEOCODING_COUNTRIES || '')
  .split(',')
  .map((code) => code.trim().toUpperCase())
  .filter((code) => code.length > 0);

// Tamaño de celda del índice espacial (grados)
export const SPATIAL_INDEX_CELL_DEGREES = parseFloat(
  process.env.SPATIAL_INDEX_CELL_DEGREES || '0.25',
);

// Parámetros por defecto del análisis
export const DEFAULT_TOLERANCE_METRES = process.env.DEFAULT_TOLERANCE_METRES
  ? parseFloat(process.env.DEFAULT_TOLERANCE_METRES)
  : undefined;
export const DEFAULT_CONTROL_SPEED_KMH = parseFloat(
  process.env.DEFAULT_CONTROL_SPEED_KMH || '2',
);
export const DEFAULT_MIN_CONTROL_SECONDS = parseInt(
  process.env.DEFAULT_MIN_CONTROL_SECONDS || '120',
  10,
); // 2 minutos
export const DEFAULT_CONTROL_RESUMPTION_METRES = parseFloat(
  process.env.DEFAULT_CONTROL_RESUMPTION_METRES || '200',
);
