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
 * Serves module files (material, video, trophy) from disk.
 * Byte-range requests are honoured so the browser can seek in videos.
 */

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { NextResponse } from "next/server";
import parseRange from "range-parser";
import { jsonError } from "./error-response.js";

export interface FileResponseOptions {
  contentType: string;
  /** Sent as an attachment with this file name. */
  downloadName?: string;
  /** Value of the request's Range header. */
  range?: string | null;
}

export interface ByteRange {
  start: number;
  end: number;
}

/**
 * Resolves the Range header to the single byte range to serve. Null means
 * the whole file is sent; multi-range and malformed headers are ignored.
 */
export function parseByteRange(
  header: string | null | undefined,
  size: number,
): ByteRange | "unsatisfiable" | null {
  if (!header) return null;

  const ranges = parseRange(size, header, { combine: true });
  if (ranges === -2) return null;
  if (ranges === -1) return "unsatisfiable";
  if (ranges.type.toLowerCase() !== "bytes" || ranges.length !== 1) return null;

  const [range] = ranges;
  return range ? { start: range.start, end: range.end } : null;
}

function toWebStream(path: string, range?: ByteRange): ReadableStream<Uint8Array> {
  const stream = createReadStream(path, range ? { start: range.start, end: range.end } : {});
  const chunks = stream[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const { value, done } = await chunks.next();
      if (done) {
        controller.close();
      } else if (value instanceof Uint8Array) {
        controller.enqueue(value);
      }
    },
    cancel() {
      stream.destroy();
    },
  });
}

export async function fileResponse(
  path: string,
  options: FileResponseOptions,
): Promise<NextResponse> {
  let size: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) return jsonError("not_found", `File not found: ${basename(path)}`, 404);
    size = info.size;
  } catch {
    return jsonError("not_found", `File not found: ${basename(path)}`, 404);
  }

  const headers: Record<string, string> = {
    "Content-Type": options.contentType,
    "Accept-Ranges": "bytes",
  };
  if (options.downloadName) {
    const name = options.downloadName.replace(/"/g, "");
    headers["Content-Disposition"] = `attachment; filename="${name}"`;
  }

  const range = parseByteRange(options.range, size);
  if (range === "unsatisfiable") {
    return new NextResponse(null, {
      status: 416,
      headers: { "Content-Range": `bytes */${size}` },
    });
  }

  if (range) {
    return new NextResponse(toWebStream(path, range), {
      status: 206,
      headers: {
        ...headers,
        "Content-Range": `bytes ${range.start}-${range.end}/${size}`,
        "Content-Length": String(range.end - range.start + 1),
      },
    });
  }

  return new NextResponse(toWebStream(path), {
    status: 200,
    headers: { ...headers, "Content-Length": String(size) },
  });
}
