// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Minimal CSV row formatting for the append-only progress log.
 * Quoting follows RFC 4180: fields with commas, quotes, or line breaks are
 * wrapped in quotes and embedded quotes are doubled.
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(values: ReadonlyArray<string | number>): string {
  return `${values.map(formatCsvField).join(",")}\n`;
}
