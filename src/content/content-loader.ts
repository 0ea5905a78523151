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
 * Extracts text from a module's training document.
 * PDF parsing is delegated to unpdf; this module only reads the file and
 * shapes the per-page output.
 */

import { readFile } from "node:fs/promises";
import { extractText, getDocumentProxy } from "unpdf";

export interface DocumentPage {
  /** 1-based page number in the source document. */
  page: number;
  text: string;
}

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: "file_not_found" | "no_document" | "parse_failed",
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

async function readDocument(documentPath: string | null): Promise<Uint8Array> {
  if (documentPath === null) {
    throw new ExtractionError("No training material found.", "no_document");
  }

  try {
    return new Uint8Array(await readFile(documentPath));
  } catch (error) {
    throw new ExtractionError(
      `Could not open training document: ${error instanceof Error ? error.message : String(error)}`,
      "file_not_found",
    );
  }
}

/**
 * Return the pages that yield text, in document order.
 * Pages with no extractable text are skipped, not returned as empty entries.
 */
export async function loadDocumentPages(documentPath: string | null): Promise<DocumentPage[]> {
  const data = await readDocument(documentPath);

  let pageTexts: string[];
  try {
    const pdf = await getDocumentProxy(data);
    const { text } = await extractText(pdf, { mergePages: false });
    pageTexts = Array.isArray(text) ? text : [text];
  } catch (error) {
    throw new ExtractionError(
      `Could not read training document: ${error instanceof Error ? error.message : String(error)}`,
      "parse_failed",
    );
  }

  const pages: DocumentPage[] = [];
  pageTexts.forEach((text, index) => {
    if (text.trim().length > 0) {
      pages.push({ page: index + 1, text });
    }
  });
  return pages;
}

/**
 * Return the full document text: every page with text, joined by newlines.
 */
export async function loadDocumentText(documentPath: string | null): Promise<string> {
  const pages = await loadDocumentPages(documentPath);
  return pages.map((p) => p.text).join("\n");
}
