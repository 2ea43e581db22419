// ---------------------------------------------------------------------------
// Tabular views of a record sequence
// ---------------------------------------------------------------------------

import type { SimulationRecord } from '../types.js';

type ColumnSpec = readonly [string, keyof SimulationRecord];

/** Output columns, in order, with the record field each one reads. */
export const RECORD_COLUMNS = [
  ['step', 'step'],
  ['time_s', 'timeS'],
  ['cmd_vel', 'cmdVel'],
  ['cmd_pos', 'cmdPos'],
  ['obj_acc', 'objAcc'],
  ['obj_vel', 'objVel'],
  ['obj_pos', 'objPos'],
  ['force', 'force'],
  ['vel_error', 'errVel'],
  ['pos_error', 'errPos'],
] as const satisfies ReadonlyArray<ColumnSpec>;

/** Appended when every record carries a mass-damper-spring force breakdown. */
export const SPRING_DAMPER_COLUMNS = [
  ['damper_force', 'damperForce'],
  ['spring_force', 'springForce'],
  ['net_force', 'netForce'],
] as const satisfies ReadonlyArray<ColumnSpec>;

export type ColumnName = (typeof RECORD_COLUMNS)[number][0];

export type SpringDamperColumnName = (typeof SPRING_DAMPER_COLUMNS)[number][0];

export type RecordColumns = Record<ColumnName, number[]> &
  Partial<Record<SpringDamperColumnName, number[]>>;

function hasSpringDamperForces(records: readonly SimulationRecord[]): boolean {
  return (
    records.length > 0 &&
    records.every(
      (r) => r.damperForce !== undefined && r.springForce !== undefined && r.netForce !== undefined,
    )
  );
}

/** Column-oriented copy of the records, one array per column. */
export function toColumns(records: readonly SimulationRecord[]): RecordColumns {
  const columns: RecordColumns = {
    step: [],
    time_s: [],
    cmd_vel: [],
    cmd_pos: [],
    obj_acc: [],
    obj_vel: [],
    obj_pos: [],
    force: [],
    vel_error: [],
    pos_error: [],
  };
  for (const record of records) {
    for (const [name, field] of RECORD_COLUMNS) {
      columns[name].push(record[field]);
    }
  }
  if (hasSpringDamperForces(records)) {
    for (const [name, field] of SPRING_DAMPER_COLUMNS) {
      columns[name] = records.map((record) => record[field] ?? Number.NaN);
    }
  }
  return columns;
}

/** CSV text with a header row and one line per record. */
export function toCsv(records: readonly SimulationRecord[]): string {
  const specs: readonly ColumnSpec[] = hasSpringDamperForces(records)
    ? [...RECORD_COLUMNS, ...SPRING_DAMPER_COLUMNS]
    : RECORD_COLUMNS;
  const lines = [specs.map(([name]) => name).join(',')];
  for (const record of records) {
    lines.push(specs.map(([, field]) => String(record[field])).join(','));
  }
  return lines.join('\n') + '\n';
}
