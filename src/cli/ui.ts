import chalk from 'chalk';
import type { SfloatValue } from '../engine/codec.js';
import type { PhaseKind, ProgressEvent } from '../engine/measurement.js';
import type { FeatureMap, MeasurementRecord } from '../interfaces/device-plugin.js';

export function success(msg: string): string {
  return chalk.green(`✔  ${msg}`);
}

export function error(msg: string): string {
  return chalk.red(`✘  ${msg}`);
}

export function info(msg: string): string {
  return chalk.blue(`ℹ  ${msg}`);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

const PHASE_LABELS: Record<PhaseKind, string> = {
  Idle: 'Waiting',
  Inflating: 'Inflating cuff...',
  Measuring: 'Measuring...',
  Deflating: 'Deflating...',
  Completed: 'Measurement complete',
  Aborted: 'Measurement aborted',
};

export function formatValue(value: SfloatValue | undefined): string {
  return value === undefined ? '-' : String(value);
}

export function formatProgress(event: ProgressEvent): string {
  if (event.type === 'phase') {
    const label = PHASE_LABELS[event.phase];
    if (event.phase === 'Completed') return success(label);
    if (event.phase === 'Aborted') return error(label);
    return info(label);
  }
  return dim(`  Cuff: ${formatValue(event.values.systolic)} ${event.values.unit}`);
}

export function formatRecord(record: MeasurementRecord): string[] {
  const { outcome, values } = record;
  if (outcome.status === 'Aborted' || !values) {
    const reason = outcome.status === 'Aborted' ? outcome.reason : 'no values';
    const detail = outcome.status === 'Aborted' && outcome.detail ? ` (${outcome.detail})` : '';
    return [error(`Aborted: ${reason}${detail}`)];
  }

  const lines = [
    success(
      `${formatValue(values.systolic)}/${formatValue(values.diastolic)} ${values.unit} ` +
        `(MAP ${formatValue(values.meanArterialPressure)})`,
    ),
  ];
  if (values.pulseRate !== undefined) lines.push(`  Pulse: ${formatValue(values.pulseRate)} bpm`);
  lines.push(
    `  Conditions: ${record.conditions.length > 0 ? record.conditions.join(', ') : 'none'}`,
  );
  lines.push(`  Battery: ${record.battery === null ? 'unknown' : `${record.battery}%`}`);
  return lines;
}

export function formatFeatures(features: FeatureMap): string[] {
  return Object.entries(features).map(([key, value]) => {
    const shown = Array.isArray(value) ? value.join(', ') || 'none' : String(value);
    return `${key}: ${shown}`;
  });
}
