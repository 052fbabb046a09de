/**
 * Response formatting
 *
 * Turns decoded Marketing Miner payloads into the plain text the tools
 * return. Optional fields stay optional in the record types so that a field
 * sent as 0 or "" is told apart from a field that was never sent.
 */

import { isRecord } from "./client.js";
import { LABELS, MESSAGES } from "./messages.js";

export interface Cpc {
  value?: unknown;
  currency_code?: unknown;
}

export interface KeywordRecord {
  keyword?: unknown;
  search_volume?: unknown;
  cpc?: Cpc;
  difficulty?: unknown;
  serp_features?: unknown[];
}

export interface VolumeRecord {
  keyword?: unknown;
  search_volume?: unknown;
  cpc?: Cpc;
  yoy_change?: number;
  peak_month?: unknown;
  monthly_sv?: Record<string, unknown>;
}

function show(value: unknown): string {
  if (value === undefined || value === null) {
    return "N/A";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

// A CPC is shown only when it is a non-empty object; anything else counts as absent.
function readCpc(value: unknown): Cpc | undefined {
  if (!isRecord(value) || Object.keys(value).length === 0) {
    return undefined;
  }
  return { value: value.value, currency_code: value.currency_code };
}

function formatCpc(cpc: Cpc): string {
  const currency =
    cpc.currency_code === undefined || cpc.currency_code === null
      ? ""
      : show(cpc.currency_code);
  return `${LABELS.cpc}: ${show(cpc.value)} ${currency}`;
}

/**
 * Read a keyword entry. JSON carries no `undefined`, so a defined field is a
 * field that was sent.
 */
export function readKeywordRecord(entry: Record<string, unknown>): KeywordRecord {
  const record: KeywordRecord = {
    keyword: entry.keyword,
    search_volume: entry.search_volume,
    difficulty: entry.difficulty,
  };
  const cpc = readCpc(entry.cpc);
  if (cpc) {
    record.cpc = cpc;
  }
  if (Array.isArray(entry.serp_features)) {
    record.serp_features = entry.serp_features;
  }
  return record;
}

export function readVolumeRecord(entry: Record<string, unknown>): VolumeRecord {
  const record: VolumeRecord = {
    keyword: entry.keyword,
    search_volume: entry.search_volume,
    peak_month: entry.peak_month,
  };
  const cpc = readCpc(entry.cpc);
  if (cpc) {
    record.cpc = cpc;
  }
  if (typeof entry.yoy_change === "number") {
    record.yoy_change = entry.yoy_change;
  }
  if (isRecord(entry.monthly_sv)) {
    record.monthly_sv = entry.monthly_sv;
  }
  return record;
}

/**
 * Render one keyword suggestion as a single pipe-separated line.
 *
 * Search volume is shown whenever the key was sent, CPC only when it is a
 * non-empty object. Difficulty needs the key and `includeExtended`; SERP
 * features need `includeExtended` and a non-empty list.
 */
export function formatKeywordLine(
  record: KeywordRecord,
  includeExtended: boolean
): string {
  const parts = [`${LABELS.keyword}: ${show(record.keyword)}`];

  if (record.search_volume !== undefined) {
    parts.push(`${LABELS.searchVolume}: ${show(record.search_volume)}`);
  }
  if (record.cpc) {
    parts.push(formatCpc(record.cpc));
  }
  if (record.difficulty !== undefined && includeExtended) {
    parts.push(`${LABELS.difficulty}: ${show(record.difficulty)}`);
  }
  if (includeExtended && record.serp_features && record.serp_features.length > 0) {
    parts.push(`${LABELS.serpFeatures}: ${record.serp_features.map(show).join(", ")}`);
  }

  return parts.join(" | ");
}

/**
 * Render the suggestions payload, one line per keyword.
 * Entries that are not plain objects are skipped.
 */
export function formatKeywordSuggestions(
  payload: unknown,
  includeExtended: boolean
): string {
  if (!isRecord(payload) || payload.status !== "success") {
    return MESSAGES.unexpectedFormat;
  }

  const data = payload.data;
  const keywords = isRecord(data) ? data.keywords : undefined;
  if (!Array.isArray(keywords) || keywords.length === 0) {
    return MESSAGES.noSuggestions;
  }

  const lines: string[] = [];
  for (const entry of keywords) {
    if (!isRecord(entry)) {
      continue;
    }
    lines.push(formatKeywordLine(readKeywordRecord(entry), includeExtended));
  }

  return lines.join("\n");
}

/**
 * Render a search volume record, one fact per line.
 */
export function formatVolumeRecord(record: VolumeRecord): string {
  const lines = [
    `${LABELS.keyword}: ${show(record.keyword)}`,
    `${LABELS.searchVolume}: ${show(record.search_volume)}`,
  ];

  if (record.cpc) {
    lines.push(formatCpc(record.cpc));
  }
  if (record.yoy_change !== undefined) {
    // yoy_change is a fraction
    lines.push(`${LABELS.yoyChange}: ${(record.yoy_change * 100).toFixed(2)}%`);
  }
  if (record.peak_month) {
    lines.push(`${LABELS.peakMonth}: ${show(record.peak_month)}`);
  }
  if (record.monthly_sv && Object.keys(record.monthly_sv).length > 0) {
    lines.push(`${LABELS.monthlyVolume}:`);
    for (const [month, volume] of Object.entries(record.monthly_sv)) {
      lines.push(`  - ${LABELS.month} ${month}: ${show(volume)}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render the search volume payload. Only the first record is used.
 */
export function formatSearchVolume(payload: unknown): string {
  if (!isRecord(payload) || payload.status !== "success") {
    return MESSAGES.unexpectedFormat;
  }

  const data = payload.data;
  if (!Array.isArray(data) || data.length === 0) {
    return MESSAGES.noVolumeData;
  }

  const first: unknown = data[0];
  if (!isRecord(first)) {
    return MESSAGES.unexpectedFormat;
  }

  return formatVolumeRecord(readVolumeRecord(first));
}
