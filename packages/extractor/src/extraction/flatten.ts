import type { EventRecord } from '../api/types';
import { EVENT_COLUMNS, type EventRow } from './types';

const SCALAR_COLUMNS = EVENT_COLUMNS.filter(
  column => column !== 'event_properties' && column !== 'user_properties' && column !== 'uuid',
);

export function toCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function propertiesCell(value: unknown): string {
  if (value === undefined || value === null) return '{}';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function flattenEvent(event: EventRecord): EventRow {
  const row: Record<string, string> = {};
  for (const column of SCALAR_COLUMNS) {
    row[column] = toCell(event[column]);
  }

  // Exports always carry uuid; older archives may not
  const uuid =
    toCell(event.uuid) ||
    [row.amplitude_id, row.event_id, row.event_time, row.event_type].join(':');

  return {
    uuid,
    event_id: row.event_id,
    user_id: row.user_id,
    device_id: row.device_id,
    event_type: row.event_type,
    event_time: row.event_time,
    amplitude_id: row.amplitude_id,
    platform: row.platform,
    os_name: row.os_name,
    city: row.city,
    country: row.country,
    event_properties: propertiesCell(event.event_properties),
    user_properties: propertiesCell(event.user_properties),
  };
}
