import { z } from "zod";
import { TextDecoder } from "node:util";
import { ConnectionDecodeError } from "../errors/fixtureErrors.js";
import type { LogRecord } from "../records/recordTypes.js";

// Shape check only: the parsed object is returned as-is, "__proto__" keys included.
const LogRecordSchema = z.custom<LogRecord>((v) => typeof v === "object" && v !== null && !Array.isArray(v));

export type FrameFormat = {
  delimiter: Buffer;
  encoding: string;
};

export const DEFAULT_DELIMITER = "\n";
export const DEFAULT_ENCODING = "utf-8";

/**
 * Validate delimiter/encoding once, before anything is bound.
 */
export function resolveFrameFormat(opts: { delimiter?: string | Buffer; encoding?: string } = {}): FrameFormat {
  const raw = opts.delimiter ?? DEFAULT_DELIMITER;
  const delimiter = typeof raw === "string" ? Buffer.from(raw, "utf-8") : Buffer.from(raw);
  if (delimiter.length === 0) throw new RangeError("Frame delimiter must not be empty");
  const encoding = opts.encoding ?? DEFAULT_ENCODING;
  // Throws RangeError for labels TextDecoder does not know.
  new TextDecoder(encoding);
  return { delimiter, encoding };
}

/**
 * Per-connection json_lines reassembly. Holds the bytes received since the last delimiter.
 */
export class FrameDecoder {
  private partial: Buffer = Buffer.alloc(0);
  private readonly delimiter: Buffer;
  private readonly encoding: string;
  private readonly textDecoder: TextDecoder;

  constructor(format: FrameFormat = resolveFrameFormat()) {
    this.delimiter = format.delimiter;
    this.encoding = format.encoding;
    this.textDecoder = new TextDecoder(format.encoding, { fatal: true });
  }

  get pendingBytes(): number {
    return this.partial.length;
  }

  /**
   * Split the buffered bytes plus `chunk` into complete frames and decode them in order.
   *
   * Splitting happens eagerly; decoding happens as the result is iterated, so records
   * before a bad frame are delivered and the bad frame throws ConnectionDecodeError.
   */
  feed(chunk: Buffer): Iterable<LogRecord> {
    const data = this.partial.length > 0 ? Buffer.concat([this.partial, chunk]) : chunk;
    const frames: Buffer[] = [];
    let start = 0;
    let idx = data.indexOf(this.delimiter, start);
    while (idx !== -1) {
      frames.push(data.subarray(start, idx));
      start = idx + this.delimiter.length;
      idx = data.indexOf(this.delimiter, start);
    }
    this.partial = Buffer.from(data.subarray(start));
    return this.decodeFrames(frames);
  }

  decodeFrame(frame: Buffer): LogRecord {
    let text: string;
    try {
      text = this.textDecoder.decode(frame);
    } catch (e: unknown) {
      throw new ConnectionDecodeError(frame, `invalid ${this.encoding} text`, e);
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConnectionDecodeError(frame, `invalid JSON (${reason})`, e);
    }

    const parsed = LogRecordSchema.safeParse(value);
    if (!parsed.success) throw new ConnectionDecodeError(frame, "frame is not a JSON object");
    return parsed.data;
  }

  private *decodeFrames(frames: Buffer[]): Generator<LogRecord> {
    for (const frame of frames) yield this.decodeFrame(frame);
  }
}
