/**
 * CSV serialization for ranked result sets.
 */

import { ResultSet } from "../models/weather";
import { SerializationError } from "../errors/pipeline-errors";

export const CITY_COLUMN = "City";

export function serializeResultSet(entries: ResultSet, valueHeader: string): string {
  const lines = [formatRow([CITY_COLUMN, valueHeader])];

  entries.forEach((entry, index) => {
    if (entry.city.length === 0) {
      throw new SerializationError(`row ${index + 1} has an empty city name`);
    }
    if (!Number.isFinite(entry.value)) {
      throw new SerializationError(
        `row ${index + 1} (${entry.city}) has a non-finite value: ${entry.value}`
      );
    }
    lines.push(formatRow([entry.city, String(entry.value)]));
  });

  return lines.map((line) => `${line}\n`).join("");
}

function formatRow(fields: string[]): string {
  return fields.map(escapeField).join(",");
}

export function escapeField(field: string): string {
  const needsQuotes = /[",\r\n]/.test(field) || field.startsWith(" ") || field.startsWith("\t");
  return needsQuotes ? `"${field.replace(/"/g, '""')}"` : field;
}
