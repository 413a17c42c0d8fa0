import { randomUUID } from 'crypto';
import type { ContentID, DatasetFormat, DatasetRecord, DatasetValidation, Identity, LogicalTime } from '../types';
import { DatasetNotFoundError } from '../utils/errors';

const UNSUPPORTED_FORMAT = 'Unsupported file format. Please upload CSV or JSON files.';

export function detectFormat(filename: string, text: string): DatasetFormat | null {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.csv')) {
    return 'csv';
  }
  if (lower.endsWith('.json')) {
    return 'json';
  }
  const trimmed = text.trimStart();
  if (trimmed.startsWith('[') || trimmed.startsWith('{')) {
    return 'json';
  }
  return text.includes(',') ? 'csv' : null;
}

/**
 * Splits CSV text into records. Handles quoted fields, doubled quotes and
 * line breaks inside quotes; blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  const endRecord = (): void => {
    record.push(field);
    if (record.length > 1 || record[0].trim() !== '') {
      records.push(record);
    }
    record = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n') {
      endRecord();
    } else if (char !== '\r') {
      field += char;
    }
  }
  if (field !== '' || record.length > 0) {
    endRecord();
  }
  return records;
}

function emptyValidation(format: DatasetFormat | null, errors: string[]): DatasetValidation {
  return { isValid: false, format, rowCount: 0, columnCount: 0, columns: [], errors, warnings: [] };
}

function validateCsv(text: string): DatasetValidation {
  const [header, ...rows] = parseCsv(text);
  if (!header || rows.length === 0) {
    return emptyValidation('csv', ['Dataset is empty']);
  }

  const columns = header.map((column) => column.trim());
  const errors: string[] = [];
  const warnings: string[] = [];
  if (columns.length < 2) {
    errors.push('Dataset must have at least 2 columns');
  }

  let missing = 0;
  let overlong = 0;
  for (const row of rows) {
    if (row.length > columns.length) {
      overlong++;
    }
    for (let i = 0; i < columns.length; i++) {
      if ((row[i] ?? '').trim() === '') {
        missing++;
      }
    }
  }
  if (overlong > 0) {
    errors.push(`Found ${overlong} rows with more fields than the header`);
  }
  if (missing > 0) {
    warnings.push(`Dataset contains ${missing} missing values`);
  }

  return {
    isValid: errors.length === 0,
    format: 'csv',
    rowCount: rows.length,
    columnCount: columns.length,
    columns,
    errors,
    warnings
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateJson(text: string): DatasetValidation {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return emptyValidation('json', [`Invalid JSON format: ${message}`]);
  }

  if (!Array.isArray(data)) {
    return emptyValidation('json', ['JSON data must be an array']);
  }
  if (data.length === 0) {
    return emptyValidation('json', ['JSON array is empty']);
  }

  const errors: string[] = [];
  const nonObjects = data.filter((item) => !isRecord(item)).length;
  if (nonObjects > 0) {
    errors.push(`Found ${nonObjects} non-object items in array`);
  }
  const first: unknown = data[0];
  const columns = isRecord(first) ? Object.keys(first) : [];

  return {
    isValid: errors.length === 0,
    format: 'json',
    rowCount: data.length,
    columnCount: columns.length,
    columns,
    errors,
    warnings: []
  };
}

/** Checks an uploaded training dataset before it is stored. */
export function validateDataset(filename: string, bytes: Uint8Array): DatasetValidation {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return emptyValidation(null, ['Dataset is not valid UTF-8 text']);
  }

  const format = detectFormat(filename, text);
  if (format === null) {
    return emptyValidation(null, [UNSUPPORTED_FORMAT]);
  }
  return format === 'csv' ? validateCsv(text) : validateJson(text);
}

export interface RegisterDatasetInput {
  filename: string;
  size: number;
  contentRef: ContentID;
  validation: DatasetValidation;
  uploadedBy: Identity;
}

function copyRecord(record: DatasetRecord): DatasetRecord {
  return {
    ...record,
    validation: {
      ...record.validation,
      columns: [...record.validation.columns],
      errors: [...record.validation.errors],
      warnings: [...record.validation.warnings]
    }
  };
}

/** Datasets that passed validation and were stored, keyed by id. */
export class DatasetRegistry {
  private datasets = new Map<string, DatasetRecord>();

  register(input: RegisterDatasetInput, at: LogicalTime): DatasetRecord {
    const record: DatasetRecord = { datasetId: randomUUID(), ...input, uploadedAt: at };
    this.datasets.set(record.datasetId, copyRecord(record));
    return copyRecord(record);
  }

  get(datasetId: string): DatasetRecord | undefined {
    const record = this.datasets.get(datasetId);
    return record ? copyRecord(record) : undefined;
  }

  require(datasetId: string): DatasetRecord {
    const record = this.get(datasetId);
    if (!record) {
      throw new DatasetNotFoundError(datasetId);
    }
    return record;
  }

  list(filter: { uploadedBy?: Identity } = {}): DatasetRecord[] {
    return this.snapshot().filter((record) => !filter.uploadedBy || record.uploadedBy === filter.uploadedBy);
  }

  snapshot(): DatasetRecord[] {
    return [...this.datasets.values()].sort((a, b) => a.uploadedAt - b.uploadedAt).map(copyRecord);
  }

  restore(records: DatasetRecord[]): void {
    this.datasets.clear();
    for (const record of records) {
      this.datasets.set(record.datasetId, copyRecord(record));
    }
  }
}
