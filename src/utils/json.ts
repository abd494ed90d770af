// Conversions from SQLite values and card records to plain JSON

import type { ArtResult, RasterImage } from '../core/interfaces/asset-bundle.interface.js';
import type { AbilityRecord, CardFieldValue, CardRecord, TextRef } from '../core/interfaces/card-reader.interface.js';
import type { SqlValue } from '../core/interfaces/schema-inspector.interface.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface ArtSummary {
  width: number;
  height: number;
  channels: number;
  bytes: number;
}

/** Integers outside the safe range keep their digits as a string. */
export function sqlValueToJson(value: TextRef): JsonValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return value;
}

export function summarizeArt(art: ArtResult): Record<string, ArtSummary> {
  const summary: Record<string, ArtSummary> = {};
  for (const [label, image] of Object.entries(art)) {
    summary[label] = { width: image.width, height: image.height, channels: image.channels, bytes: image.data.length };
  }
  return summary;
}

function recordToJson(record: AbilityRecord): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, field] of Object.entries(record)) {
    out[key] = sqlValueToJson(field);
  }
  return out;
}

function isRasterImage(value: SqlValue | RasterImage): value is RasterImage {
  return typeof value === 'object' && value !== null && !Buffer.isBuffer(value);
}

// Ability records hold column values, art results hold decoded images
function isArtResult(value: AbilityRecord | ArtResult): value is ArtResult {
  const entries: Array<SqlValue | RasterImage> = Object.values(value);
  return entries.every(isRasterImage);
}

function fieldToJson(value: CardFieldValue): JsonValue {
  if (value === null || typeof value !== 'object' || Buffer.isBuffer(value)) {
    return sqlValueToJson(value);
  }
  if (Array.isArray(value)) {
    return value.map(recordToJson);
  }
  if (!isArtResult(value)) {
    return recordToJson(value);
  }
  const art: Record<string, JsonValue> = {};
  for (const [label, image] of Object.entries(summarizeArt(value))) {
    art[label] = { ...image };
  }
  return art;
}

/** Pixel data is replaced by its dimensions. */
export function cardToJson(card: CardRecord): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(card)) {
    out[key] = fieldToJson(value);
  }
  return out;
}

/** `JSON.stringify` replacer for inspector summaries, which may carry 64-bit pragma values. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? sqlValueToJson(value) : value;
}
