import { OdooRecord } from '../odoo/interfaces/odoo.interface';

/*
 * Odoo answers `false` for every empty field, whatever its type. These readers
 * narrow one field at a time and reject values of the wrong shape.
 */

function unexpected(record: OdooRecord, field: string): TypeError {
  return new TypeError(
    `Odoo record ${record.id} has an unexpected value in field ${field}`,
  );
}

export function readString(record: OdooRecord, field: string): string {
  const value = record[field];
  if (value === false || value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  throw unexpected(record, field);
}

export function readOptionalString(
  record: OdooRecord,
  field: string,
): string | null {
  const value = readString(record, field);
  return value === '' ? null : value;
}

export function readNumber(record: OdooRecord, field: string): number {
  const value = record[field];
  if (value === false || value === undefined || value === null) return 0;
  if (typeof value === 'number') return value;
  throw unexpected(record, field);
}

/** Many2one fields come back as `[id, display_name]` or `false`. */
export function readMany2One(record: OdooRecord, field: string): number | null {
  const value = record[field];
  if (value === false || value === undefined || value === null) return null;
  if (Array.isArray(value) && typeof value[0] === 'number') return value[0];
  throw unexpected(record, field);
}

export function requireMany2One(record: OdooRecord, field: string): number {
  const id = readMany2One(record, field);
  if (id === null) {
    throw new TypeError(`Odoo record ${record.id} has no ${field}`);
  }
  return id;
}

/** Odoo record display name, falling back to `model #id`. */
export function displayName(record: OdooRecord, model: string): string {
  const name = record.name;
  return typeof name === 'string' && name !== '' ? name : `${model} #${record.id}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD`, in UTC. */
export function toOdooDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** `YYYY-MM-DD HH:MM:SS`, in UTC like every Odoo datetime. */
export function toOdooDateTime(date: Date): string {
  return `${toOdooDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/** Parses Odoo `date` and `datetime` strings as UTC. */
export function parseOdooDate(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?/.exec(value);
  if (!match) {
    throw new TypeError(`Unrecognized Odoo date ${value}`);
  }
  const [, year, month, day, hours = '0', minutes = '0', seconds = '0'] = match;
  return new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds),
    ),
  );
}
