/**
 * Stable JSON serialization of pipeline outputs.
 *
 * Outputs are validated against their JSON schema before they are written.
 * Nothing time- or run-dependent is added here, so equal values give equal
 * bytes.
 */
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  validateOutputOrThrow,
  type CanonicalLedger,
  type OutputKind,
  type VerificationReport,
} from '@warrant-ledger/types';

export interface SerializeOptions {
  /** Indent with two spaces (default: false) */
  pretty?: boolean;
}

export function serializeJson(value: unknown, options: SerializeOptions = {}): string {
  return `${JSON.stringify(value, null, options.pretty === true ? 2 : undefined)}\n`;
}

export function serializeOutput(kind: OutputKind, payload: unknown, options: SerializeOptions = {}): string {
  validateOutputOrThrow(kind, payload);
  return serializeJson(payload, options);
}

export function serializeLedger(ledger: CanonicalLedger, options: SerializeOptions = {}): string {
  return serializeOutput('ledger', ledger, options);
}

export function serializeReport(report: VerificationReport, options: SerializeOptions = {}): string {
  return serializeOutput('verification-report', report, options);
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
}
