import { SensorField, SensorFieldDefinition, SensorStatus } from '../types/reading';

/**
 * Sensor Field Catalog
 *
 * Generation ranges describe a comfortable indoor room.
 * Valid ranges follow the operating range of common BME280-class sensors.
 */
export const SENSOR_FIELDS: SensorFieldDefinition[] = [
  {
    field: 'temperature',
    name: 'Temperature',
    unit: '°C',
    generation: { min: 18.0, max: 26.0 },
    valid: { min: -40.0, max: 85.0 },
  },
  {
    field: 'humidity',
    name: 'Humidity',
    unit: '%',
    generation: { min: 30.0, max: 65.0 },
    valid: { min: 0.0, max: 100.0 },
  },
  {
    field: 'pressure',
    name: 'Pressure',
    unit: 'hPa',
    generation: { min: 1000.0, max: 1030.0 },
    valid: { min: 300.0, max: 1100.0 },
  },
];

export const SENSOR_STATUSES: readonly SensorStatus[] = ['normal', 'warning', 'critical'];

/**
 * Get a field definition by name
 */
export function getSensorField(field: SensorField): SensorFieldDefinition {
  const def = SENSOR_FIELDS.find((f) => f.field === field);
  if (!def) {
    throw new Error(`Unknown sensor field: ${field}`);
  }
  return def;
}

/**
 * Get all numeric field names, in catalog order
 */
export function getSensorFieldNames(): SensorField[] {
  return SENSOR_FIELDS.map((f) => f.field);
}
