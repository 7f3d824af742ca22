import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { Objective, Parameter, ParameterRow, ResultRow, RunBatch } from '../types.js';
import { ValidationError } from '../errors.js';
import { coerceValue, RESERVED_COLUMNS } from '../space/parameters.js';

type CsvRecord = Record<string, string>;

const CsvRecordsSchema = z.array(z.record(z.string()));

function readRecords(text: string): CsvRecord[] {
  let raw: unknown;
  try {
    raw = parse(text, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  } catch (err) {
    throw new ValidationError('Unreadable CSV', [err instanceof Error ? err.message : String(err)]);
  }
  return CsvRecordsSchema.parse(raw);
}

function readNumber(text: string | undefined): number | null | undefined {
  if (text === undefined || text === '') return undefined;
  const num = Number(text);
  return Number.isFinite(num) ? num : null;
}

/**
 * Parameter columns for a batch: the current parameters it carries, in
 * config order, then any it carries from an older config version.
 */
function parameterColumns(parameters: Parameter[], batch: RunBatch): string[] {
  const carried = new Set(batch.rows.flatMap(row => Object.keys(row)));
  const current = parameters.map(p => p.name);
  return [
    ...current.filter(name => carried.has(name)),
    ...[...carried].filter(name => !current.includes(name)),
  ];
}

/**
 * Render a batch as the run CSV handed to the lab:
 * one column per parameter, then batch_id, row_index, status.
 */
export function batchToCsv(parameters: Parameter[], batch: RunBatch): string {
  const names = parameterColumns(parameters, batch);
  const columns = [...names, ...RESERVED_COLUMNS];
  const records = batch.rows.map((row, index) => [
    ...names.map(name => row[name] ?? ''),
    batch.batch_id,
    index,
    batch.status,
  ]);
  return stringify(records, { header: true, columns });
}

/**
 * Parse a results file: a row_index column plus one column per objective.
 * Other columns (the run CSV's own) are ignored so a filled-in run CSV can be submitted as is.
 * Blank cells are left out; the orchestrator reports missing objectives.
 */
export function parseResultsCsv(text: string, objectives: Objective[]): ResultRow[] {
  const records = readRecords(text);
  const issues: string[] = [];
  const rows: ResultRow[] = [];

  records.forEach((record, i) => {
    const line = i + 2;
    const index = Number(record.row_index);
    if (record.row_index === undefined || record.row_index === '' || !Number.isInteger(index)) {
      issues.push(`line ${line}: row_index must be an integer`);
      return;
    }
    const values: Record<string, number> = {};
    for (const objective of objectives) {
      const value = readNumber(record[objective.name]);
      if (value === null) {
        issues.push(`line ${line}: '${objective.name}' is not a number`);
      } else if (value !== undefined) {
        values[objective.name] = value;
      }
    }
    rows.push({ row_index: index, values });
  });

  if (issues.length > 0) {
    throw new ValidationError('Invalid results file', issues);
  }
  return rows;
}

export interface ImportedRow {
  parameters: ParameterRow;
  values: Record<string, number>;
}

/**
 * Parse previously measured experiments: one column per parameter and per objective.
 * Every cell is required; domain checks happen in the orchestrator.
 */
export function parseImportCsv(text: string, parameters: Parameter[], objectives: Objective[]): ImportedRow[] {
  const records = readRecords(text);
  const issues: string[] = [];
  const rows: ImportedRow[] = [];

  if (records.length === 0) {
    throw new ValidationError('Import file has no data rows');
  }

  records.forEach((record, i) => {
    const line = i + 2;
    const row: ParameterRow = {};
    const values: Record<string, number> = {};
    let ok = true;

    for (const param of parameters) {
      const cell = record[param.name];
      const value = cell === undefined ? undefined : coerceValue(param, cell);
      if (value === undefined) {
        issues.push(`line ${line}: missing or unreadable value for '${param.name}'`);
        ok = false;
      } else {
        row[param.name] = value;
      }
    }
    for (const objective of objectives) {
      const value = readNumber(record[objective.name]);
      if (value === undefined || value === null) {
        issues.push(`line ${line}: missing or non-numeric '${objective.name}'`);
        ok = false;
      } else {
        values[objective.name] = value;
      }
    }
    if (ok) rows.push({ parameters: row, values });
  });

  if (issues.length > 0) {
    throw new ValidationError('Invalid import file', issues);
  }
  return rows;
}
