/**
 * Byte-bounded truncation for operation output echoed back to the backend.
 *
 * Keeps the first and last halves and inserts a marker with the omitted
 * byte count: [···TRUNCATED N bytes···]
 */

const MARKER_OVERHEAD = 40;

const MIDDLE_DOT = '·';

function buildMarker(omittedBytes: number): string {
  return `[${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}TRUNCATED ${String(omittedBytes)} bytes${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}]`;
}

// UTF-8 continuation bytes look like 10xxxxxx
function findSafeUtf8Boundary(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;
  let offset = targetOffset;
  while (offset > 0 && ((buffer[offset] ?? 0) & 0xc0) === 0x80) {
    offset -= 1;
  }
  return offset;
}

export function truncateToBytes(text: string, maxBytes: number): string {
  const buffer = Buffer.from(text, 'utf8');
  if (buffer.length <= maxBytes) return text;
  const budget = Math.max(0, maxBytes - MARKER_OVERHEAD);
  const headEnd = findSafeUtf8Boundary(buffer, Math.floor(budget / 2));
  const tailStart = findSafeUtf8Boundary(buffer, buffer.length - Math.ceil(budget / 2));
  const omitted = tailStart - headEnd;
  const head = buffer.subarray(0, headEnd).toString('utf8');
  const tail = buffer.subarray(tailStart).toString('utf8');
  return `${head}${buildMarker(omitted)}${tail}`;
}

/**
 * Collects a byte stream of unknown length while holding at most the first
 * and the last `maxBytes`. `toString()` gives what truncateToBytes would
 * give for the whole stream.
 */
export class TruncatingCollector {
  private readonly head: Buffer[] = [];
  private headBytes = 0;
  private readonly tail: Buffer[] = [];
  private tailBytes = 0;
  private totalBytes = 0;

  constructor(private readonly maxBytes: number) {}

  get byteLength(): number {
    return this.totalBytes;
  }

  push(chunk: Buffer): void {
    this.totalBytes += chunk.length;
    if (this.headBytes < this.maxBytes) {
      const take = Math.min(this.maxBytes - this.headBytes, chunk.length);
      this.head.push(Buffer.from(chunk.subarray(0, take)));
      this.headBytes += take;
    }
    this.tail.push(chunk);
    this.tailBytes += chunk.length;
    while (this.tailBytes > this.maxBytes) {
      const first = this.tail[0];
      const excess = this.tailBytes - this.maxBytes;
      if (first.length <= excess) {
        this.tail.shift();
        this.tailBytes -= first.length;
      } else {
        this.tail[0] = Buffer.from(first.subarray(excess));
        this.tailBytes -= excess;
      }
    }
  }

  toString(): string {
    const head = Buffer.concat(this.head);
    if (this.totalBytes <= this.maxBytes) return head.toString('utf8');
    const tail = Buffer.concat(this.tail);
    const budget = Math.max(0, this.maxBytes - MARKER_OVERHEAD);
    const headEnd = findSafeUtf8Boundary(head, Math.floor(budget / 2));
    const tailStart = findSafeUtf8Boundary(tail, tail.length - Math.ceil(budget / 2));
    const omitted = this.totalBytes - headEnd - (tail.length - tailStart);
    return `${head.subarray(0, headEnd).toString('utf8')}${buildMarker(omitted)}${tail.subarray(tailStart).toString('utf8')}`;
  }
}
