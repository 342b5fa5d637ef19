/**
 * Cited source references.
 *
 *   bucket:<dim>=<value>[;<dim>=<value>...]
 *   document:<documentId>
 *   document:<documentId>#page=<n>
 *   document:<documentId>#stated-total
 *   record:<recordId>
 */
import { DimensionSchema, normalizePayee, type Dimension } from '@warrant-ledger/types';

export type SourceRef =
  | { kind: 'bucket'; dimensions: Array<[Dimension, string]> }
  | { kind: 'document'; documentId: string }
  | { kind: 'document-page'; documentId: string; pageIndex: number }
  | { kind: 'stated-total'; documentId: string }
  | { kind: 'record'; recordId: string };

export type ParsedSourceRef = { ok: true; ref: SourceRef } | { ok: false; detail: string };

function parseBucket(body: string): ParsedSourceRef {
  const dimensions: Array<[Dimension, string]> = [];
  const seen = new Set<Dimension>();

  for (const part of body.split(';')) {
    const separator = part.indexOf('=');
    if (separator <= 0) {
      return { ok: false, detail: `Malformed bucket condition "${part}"` };
    }
    const name = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();

    const dimension = DimensionSchema.safeParse(name);
    if (!dimension.success) {
      return { ok: false, detail: `Unknown dimension "${name}"` };
    }
    if (seen.has(dimension.data)) {
      return { ok: false, detail: `Dimension "${name}" appears twice` };
    }
    if (value === '') {
      return { ok: false, detail: `Empty value for dimension "${name}"` };
    }
    seen.add(dimension.data);
    dimensions.push([dimension.data, dimension.data === 'payee' ? normalizePayee(value) : value]);
  }

  return { ok: true, ref: { kind: 'bucket', dimensions } };
}

function parseDocument(body: string): ParsedSourceRef {
  const hash = body.indexOf('#');
  const documentId = (hash === -1 ? body : body.slice(0, hash)).trim();
  if (documentId === '') {
    return { ok: false, detail: 'Missing document id' };
  }
  if (hash === -1) {
    return { ok: true, ref: { kind: 'document', documentId } };
  }

  const fragment = body.slice(hash + 1).trim();
  if (fragment === 'stated-total') {
    return { ok: true, ref: { kind: 'stated-total', documentId } };
  }
  const page = /^page=(\d+)$/.exec(fragment);
  if (page !== null && Number(page[1]) >= 1) {
    return { ok: true, ref: { kind: 'document-page', documentId, pageIndex: Number(page[1]) } };
  }
  return { ok: false, detail: `Unknown document fragment "#${fragment}"` };
}

export function parseSourceRef(source: string): ParsedSourceRef {
  const colon = source.indexOf(':');
  if (colon === -1) {
    return { ok: false, detail: `Malformed source reference "${source}"` };
  }
  const scheme = source.slice(0, colon).trim();
  const body = source.slice(colon + 1);

  switch (scheme) {
    case 'bucket':
      return parseBucket(body);
    case 'document':
      return parseDocument(body);
    case 'record': {
      const recordId = body.trim();
      return recordId === ''
        ? { ok: false, detail: 'Missing record id' }
        : { ok: true, ref: { kind: 'record', recordId } };
    }
    default:
      return { ok: false, detail: `Unknown source scheme "${scheme}"` };
  }
}
