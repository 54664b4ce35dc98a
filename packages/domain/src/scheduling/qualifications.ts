import type { TruckTypeCode } from '../entities/truck.js';

export interface QualificationRecord {
  readonly firstName: string;
  readonly lastName: string;
  readonly truckType: TruckTypeCode;
}

/**
 * Read a technician qualification file. Records span two lines: the first
 * ends with "<first> <last>", the second holds the truck type code.
 * Blank lines are ignored and a trailing name without a code is dropped.
 */
export function parseQualificationRecords(text: string): QualificationRecord[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const records: QualificationRecord[] = [];
  for (let i = 0; i + 1 < lines.length; i += 2) {
    const nameLine = lines[i] ?? '';
    const truckType = lines[i + 1] ?? '';
    const tokens = nameLine.split(/\s+/);
    const lastName = tokens.at(-1);
    const firstName = tokens.at(-2);
    if (firstName === undefined || lastName === undefined) continue;
    records.push({ firstName, lastName, truckType });
  }
  return records;
}

export function fullName(record: QualificationRecord): string {
  return `${record.firstName} ${record.lastName}`;
}

export type QualificationRejection =
  | 'UNKNOWN_TRUCK_TYPE'
  | 'UNKNOWN_EMPLOYEE'
  | 'EMPLOYEE_IS_DRIVER'
  | 'ALREADY_QUALIFIED'
  | 'STORAGE_FAILURE';
