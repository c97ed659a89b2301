/**
 * CityListReader - splits an uploaded city list into CityName tokens
 *
 * Input is comma-delimited text that may arrive in arbitrary chunks:
 * ```
 * London, Paris,
 * New York,Tokyo
 * ```
 * gives `["London", "Paris", "NewYork", "Tokyo"]`.
 */

import { CityName } from "../models/weather";

const DELIMITER = ",";

/**
 * Incremental splitter. Feed chunks with `push`, then call `end` for the
 * trailing token that has no delimiter after it.
 */
export class CityListReader {
  private decoder = new TextDecoder("utf-8");
  private pending = "";

  push(chunk: Uint8Array | string): CityName[] {
    this.pending +=
      typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });

    const cities: CityName[] = [];
    let index = this.pending.indexOf(DELIMITER);
    while (index >= 0) {
      addToken(cities, this.pending.slice(0, index));
      this.pending = this.pending.slice(index + DELIMITER.length);
      index = this.pending.indexOf(DELIMITER);
    }
    return cities;
  }

  end(): CityName[] {
    this.pending += this.decoder.decode();
    const cities: CityName[] = [];
    addToken(cities, this.pending);
    this.pending = "";
    return cities;
  }
}

/**
 * Drain a chunk stream into the ordered list of city names.
 */
export async function readCityList(
  chunks: AsyncIterable<Uint8Array | string>
): Promise<CityName[]> {
  const reader = new CityListReader();
  const cities: CityName[] = [];
  for await (const chunk of chunks) {
    cities.push(...reader.push(chunk));
  }
  cities.push(...reader.end());
  return cities;
}

export function parseCityList(text: string): CityName[] {
  const reader = new CityListReader();
  return [...reader.push(text), ...reader.end()];
}

export function normalizeCityName(token: string): CityName {
  return token.replace(/\s+/g, "");
}

function addToken(cities: CityName[], token: string): void {
  const city = normalizeCityName(token);
  if (city.length > 0) {
    cities.push(city);
  }
}
