/**
 * Streaming POSIX ustar codec.
 * Regular files and symbolic links; PAX extended headers carry names and
 * link targets that do not fit the fixed ustar fields.
 */

const BLOCK = 512;
const MAX_OCTAL_SIZE = 0o77777777777;

export type TarEntryType = 'file' | 'symlink';

export interface TarHeader {
  name: string;
  type: TarEntryType;
  mode: number;
  /** Modification time in milliseconds (stored with second precision). */
  mtimeMs: number;
  size: number;
  linkTarget: string | null;
}

export interface TarEntry {
  header: TarHeader;
  /**
   * Exactly `header.size` bytes of file data; empty for symlinks. Entries
   * from `readTarEntries` must be consumed before the next entry is read,
   * or their remaining data is skipped.
   */
  body: AsyncIterable<Buffer>;
}

export const END_OF_ARCHIVE = Buffer.alloc(BLOCK * 2, 0);

function padOctal(n: number, len: number): string {
  return n.toString(8).padStart(len - 1, '0') + '\0';
}

function headerChecksum(header: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK; i++) {
    // Checksum field (148-155) counts as spaces
    sum += (i >= 148 && i < 156) ? 32 : (header[i] ?? 0);
  }
  return sum;
}

function paddingFor(size: number): number {
  const remainder = size % BLOCK;
  return remainder === 0 ? 0 : BLOCK - remainder;
}

export function blockPadding(size: number): Buffer {
  return Buffer.alloc(paddingFor(size), 0);
}

function paxRecord(key: string, value: string): string {
  const body = ` ${key}=${value}\n`;
  const bodyLength = Buffer.byteLength(body);
  let length = bodyLength + String(bodyLength).length;
  if (String(length).length !== String(bodyLength).length) {
    length = bodyLength + String(length).length;
  }
  return `${length}${body}`;
}

/** Split a long path across the ustar prefix (155) and name (100) fields. */
function splitUstarName(name: string): { prefix: string; name: string } | null {
  if (Buffer.byteLength(name) <= 100) {
    return { prefix: '', name };
  }
  for (let i = name.indexOf('/'); i !== -1; i = name.indexOf('/', i + 1)) {
    const prefix = name.slice(0, i);
    const rest = name.slice(i + 1);
    if (Buffer.byteLength(prefix) <= 155 && Buffer.byteLength(rest) <= 100 && rest.length > 0) {
      return { prefix, name: rest };
    }
  }
  return null;
}

function writeHeaderBlock(
  fields: { name: string; prefix: string; mode: number; size: number; mtimeMs: number; typeflag: string; linkname: string },
): Buffer {
  const header = Buffer.alloc(BLOCK, 0);

  header.write(fields.name, 0, 100, 'utf8');
  header.write(padOctal(fields.mode & 0o7777, 8), 100, 8, 'utf8');
  header.write(padOctal(0, 8), 108, 8, 'utf8');
  header.write(padOctal(0, 8), 116, 8, 'utf8');
  header.write(padOctal(fields.size, 12), 124, 12, 'utf8');
  header.write(padOctal(Math.max(0, Math.floor(fields.mtimeMs / 1000)), 12), 136, 12, 'utf8');
  header.write(fields.typeflag, 156, 1, 'utf8');
  header.write(fields.linkname, 157, 100, 'utf8');
  header.write('ustar\0', 257, 6, 'utf8');
  header.write('00', 263, 2, 'utf8');
  header.write(fields.prefix, 345, 155, 'utf8');

  const cksum = headerChecksum(header);
  header.write(padOctal(cksum, 7), 148, 7, 'utf8');
  header[155] = 0x20;
  return header;
}

/**
 * Encode the header block(s) for one entry: a PAX extended header when
 * needed, followed by the ustar header.
 */
export function encodeHeader(entry: TarHeader): Buffer {
  const size = entry.type === 'file' ? entry.size : 0;
  const linkTarget = entry.linkTarget ?? '';
  const split = splitUstarName(entry.name);
  const pax: string[] = [];

  if (!split) pax.push(paxRecord('path', entry.name));
  if (Buffer.byteLength(linkTarget) > 100) pax.push(paxRecord('linkpath', linkTarget));
  if (size > MAX_OCTAL_SIZE) {
    throw new Error(`Entry '${entry.name}' is too large for a ustar header (${size} bytes).`);
  }

  const typeflag = entry.type === 'symlink' ? '2' : '0';
  const blocks: Buffer[] = [];

  if (pax.length > 0) {
    const paxData = Buffer.from(pax.join(''), 'utf8');
    blocks.push(
      writeHeaderBlock({
        name: `PaxHeader/${entry.name.slice(-80)}`.slice(0, 100),
        prefix: '',
        mode: 0o644,
        size: paxData.length,
        mtimeMs: entry.mtimeMs,
        typeflag: 'x',
        linkname: '',
      }),
      paxData,
      blockPadding(paxData.length),
    );
  }

  blocks.push(
    writeHeaderBlock({
      name: split ? split.name : entry.name.slice(-100),
      prefix: split ? split.prefix : '',
      mode: entry.mode,
      size,
      mtimeMs: entry.mtimeMs,
      typeflag,
      linkname: linkTarget.slice(0, 100),
    }),
  );

  return Buffer.concat(blocks);
}

export async function* bufferBody(data: Buffer): AsyncGenerator<Buffer> {
  if (data.length > 0) yield data;
}

/**
 * Serialize entries into a tar byte stream (headers, data, padding and the
 * end-of-archive marker). File bodies are streamed and must supply exactly
 * the number of bytes their header declares.
 */
export async function* tarStream(entries: AsyncIterable<TarEntry> | Iterable<TarEntry>): AsyncGenerator<Buffer> {
  for await (const entry of entries) {
    yield encodeHeader(entry.header);
    if (entry.header.type !== 'file') continue;

    let written = 0;
    for await (const chunk of entry.body) {
      written += chunk.length;
      if (chunk.length > 0) yield chunk;
    }
    if (written !== entry.header.size) {
      throw new Error(
        `Entry '${entry.header.name}' supplied ${written} bytes but its header declares ${entry.header.size}.`,
      );
    }
    const pad = blockPadding(written);
    if (pad.length > 0) yield pad;
  }
  yield END_OF_ARCHIVE;
}

// ── Reading ──────────────────────────────────────────────────────────────────

function unexpectedEnd(): Error {
  return new Error('Corrupt tar archive: unexpected end of data.');
}

/** Pull-based reader over a chunked byte source. */
class ByteReader {
  readonly #iterator: AsyncIterator<Buffer | string>;
  #buffer: Buffer = Buffer.alloc(0);
  #ended = false;

  constructor(source: AsyncIterable<Buffer | string>) {
    this.#iterator = source[Symbol.asyncIterator]();
  }

  async #fill(): Promise<boolean> {
    if (this.#ended) return false;
    const next = await this.#iterator.next();
    if (next.done) {
      this.#ended = true;
      return false;
    }
    const chunk = typeof next.value === 'string' ? Buffer.from(next.value) : next.value;
    this.#buffer = this.#buffer.length === 0 ? chunk : Buffer.concat([this.#buffer, chunk]);
    return true;
  }

  #take(max: number): Buffer {
    const piece = this.#buffer.subarray(0, Math.min(max, this.#buffer.length));
    this.#buffer = this.#buffer.subarray(piece.length);
    return piece;
  }

  /** Read exactly `n` bytes, or null when the source ends first. */
  async read(n: number): Promise<Buffer | null> {
    while (this.#buffer.length < n) {
      if (!(await this.#fill())) return null;
    }
    return this.#take(n);
  }

  /** Yield the next `progress.remaining` bytes as they arrive. */
  async *stream(progress: { remaining: number }): AsyncGenerator<Buffer> {
    while (progress.remaining > 0) {
      if (this.#buffer.length === 0 && !(await this.#fill())) throw unexpectedEnd();
      const piece = this.#take(progress.remaining);
      progress.remaining -= piece.length;
      yield piece;
    }
  }

  async skip(n: number): Promise<void> {
    let remaining = n;
    while (remaining > 0) {
      if (this.#buffer.length === 0 && !(await this.#fill())) throw unexpectedEnd();
      remaining -= this.#take(remaining).length;
    }
  }

  /** Consume whatever follows, such as the record padding after the end marker. */
  async drain(): Promise<void> {
    this.#buffer = Buffer.alloc(0);
    while (await this.#fill()) {
      this.#buffer = Buffer.alloc(0);
    }
  }
}

function readString(block: Buffer, offset: number, length: number): string {
  const raw = block.subarray(offset, offset + length);
  const end = raw.indexOf(0);
  return raw.subarray(0, end === -1 ? raw.length : end).toString('utf8');
}

function readOctal(block: Buffer, offset: number, length: number): number {
  const text = readString(block, offset, length).trim();
  if (text === '') return 0;
  const value = parseInt(text, 8);
  if (Number.isNaN(value)) {
    throw new Error(`Corrupt tar header: invalid octal field '${text}'.`);
  }
  return value;
}

function parsePax(data: Buffer): Map<string, string> {
  const records = new Map<string, string>();
  let offset = 0;
  while (offset < data.length) {
    const space = data.indexOf(0x20, offset);
    if (space === -1) break;
    const length = parseInt(data.subarray(offset, space).toString('utf8'), 10);
    if (!Number.isFinite(length) || length <= 0) {
      throw new Error('Corrupt tar archive: malformed PAX record.');
    }
    const record = data.subarray(space + 1, offset + length - 1).toString('utf8');
    const eq = record.indexOf('=');
    if (eq > 0) {
      records.set(record.slice(0, eq), record.slice(eq + 1));
    }
    offset += length;
  }
  return records;
}

interface RawHeader {
  name: string;
  typeflag: string;
  mode: number;
  size: number;
  mtimeMs: number;
  linkname: string;
}

function decodeHeaderBlock(block: Buffer): RawHeader {
  const stored = readOctal(block, 148, 8);
  if (stored !== headerChecksum(block)) {
    throw new Error('Corrupt tar header: checksum mismatch.');
  }
  const name = readString(block, 0, 100);
  const magic = readString(block, 257, 6);
  const prefix = magic.startsWith('ustar') ? readString(block, 345, 155) : '';
  return {
    name: prefix ? `${prefix}/${name}` : name,
    typeflag: readString(block, 156, 1) || '0',
    mode: readOctal(block, 100, 8),
    size: readOctal(block, 124, 12),
    mtimeMs: readOctal(block, 136, 12) * 1000,
    linkname: readString(block, 157, 100),
  };
}

/**
 * Parse a tar byte stream into entries whose data is streamed from the
 * source. Throws on checksum errors and on archives that end before the
 * end-of-archive marker.
 */
export async function* readTarEntries(source: AsyncIterable<Buffer | string>): AsyncGenerator<TarEntry> {
  const reader = new ByteReader(source);
  let pax: Map<string, string> | null = null;

  for (;;) {
    const block = await reader.read(BLOCK);
    if (!block) throw unexpectedEnd();
    if (block.every((byte) => byte === 0)) {
      await reader.drain();
      return;
    }

    const header = decodeHeaderBlock(block);
    const padding = paddingFor(header.size);

    if (header.typeflag === 'x') {
      const data = await reader.read(header.size + padding);
      if (!data) throw unexpectedEnd();
      pax = parsePax(data.subarray(0, header.size));
      continue;
    }
    if (header.typeflag !== '0' && header.typeflag !== '2') {
      // Directories, global headers and other types carry nothing we replay
      await reader.skip(header.size + padding);
      pax = null;
      continue;
    }

    const overrides = pax;
    pax = null;
    const type: TarEntryType = header.typeflag === '2' ? 'symlink' : 'file';
    const progress = { remaining: header.size };
    yield {
      header: {
        name: overrides?.get('path') ?? header.name,
        type,
        mode: header.mode,
        mtimeMs: header.mtimeMs,
        size: type === 'file' ? header.size : 0,
        linkTarget: type === 'symlink' ? overrides?.get('linkpath') ?? header.linkname : null,
      },
      body: reader.stream(progress),
    };
    await reader.skip(progress.remaining + padding);
  }
}
