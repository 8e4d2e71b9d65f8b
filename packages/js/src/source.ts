/**
 * Input resolution
 *
 * Turns whatever the caller handed to `parse()` into XML text:
 *
 * - `Buffer`            → decoded as UTF-8
 * - `Readable`          → drained and decoded as UTF-8
 * - text with a newline → taken as the document itself
 * - `http:`/`https:`/`ftp:` prefix → fetched with axios
 * - anything else       → read from the filesystem
 */

import axios from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { SvgMetadataError, describeError, isSvgMetadataError } from './errors.js';
import { MetadataSource, SourceAllowlist } from './types.js';

const URL_PATTERN = /^(https?|ftp):/i;

export interface ResolveLimits {
  maxDocumentSize: number;
  fetchTimeout: number;
}

export type SourceKind = 'buffer' | 'stream' | 'text' | 'url' | 'path';

/** Classify a source the way `resolveSource` will treat it */
export function classifySource(source: MetadataSource): SourceKind {
  if (Buffer.isBuffer(source)) return 'buffer';
  if (source instanceof Readable) return 'stream';
  if (source.includes('\n')) return 'text';
  if (URL_PATTERN.test(source)) return 'url';
  return 'path';
}

function checkSize(byteLength: number, limits: ResolveLimits): void {
  if (byteLength > limits.maxDocumentSize) {
    throw new SvgMetadataError(
      'DocumentTooLarge',
      `Document size ${byteLength} exceeds limit ${limits.maxDocumentSize}`
    );
  }
}

/**
 * Synchronous resolution for sources that need no waiting: buffers, literal
 * text and filesystem paths.
 */
export function resolveSourceSync(source: string | Buffer | undefined | null, limits: ResolveLimits): string {
  if (source === undefined || source === null) {
    throw new SvgMetadataError('MissingInput', 'No source given for parsing');
  }

  const kind = classifySource(source);
  if (Buffer.isBuffer(source)) {
    checkSize(source.byteLength, limits);
    return source.toString('utf8');
  }
  if (kind === 'text') {
    checkSize(Buffer.byteLength(source, 'utf8'), limits);
    return source;
  }
  if (kind === 'url') {
    throw new SvgMetadataError('FetchFailure', `URL sources need asynchronous parsing: ${source}`);
  }
  return readPath(source, limits);
}

function readPath(filePath: string, limits: ResolveLimits): string {
  if (!fs.existsSync(filePath)) {
    throw new SvgMetadataError('FileNotFound', `File '${filePath}' does not exist`);
  }
  try {
    const stats = fs.statSync(filePath);
    if (!stats.isFile()) {
      throw new SvgMetadataError('FileNotFound', `'${filePath}' is not a regular file`);
    }
    checkSize(stats.size, limits);
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isSvgMetadataError(error)) throw error;
    throw new SvgMetadataError('ReadFailure', `Could not read '${filePath}': ${describeError(error)}`, { cause: error });
  }
}

/** Resolve any supported source into XML text */
export async function resolveSource(
  source: MetadataSource | undefined | null,
  limits: ResolveLimits
): Promise<string> {
  if (source === undefined || source === null) {
    throw new SvgMetadataError('MissingInput', 'No source given for parsing');
  }
  if (source instanceof Readable) return readStream(source, limits);
  if (typeof source === 'string' && classifySource(source) === 'url') return fetchUrl(source, limits);
  return resolveSourceSync(source, limits);
}

async function readStream(stream: Readable, limits: ResolveLimits): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  try {
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8');
      size += buffer.byteLength;
      checkSize(size, limits);
      chunks.push(buffer);
    }
  } catch (error) {
    if (isSvgMetadataError(error)) throw error;
    throw new SvgMetadataError('ReadFailure', `Could not read stream: ${describeError(error)}`, { cause: error });
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function fetchUrl(url: string, limits: ResolveLimits): Promise<string> {
  let data: unknown;
  try {
    const response = await axios.get<string>(url, {
      responseType: 'text',
      timeout: limits.fetchTimeout,
      maxContentLength: limits.maxDocumentSize,
    });
    data = response.data;
  } catch (error) {
    throw new SvgMetadataError('FetchFailure', `Could not retrieve ${url}: ${describeError(error)}`, { cause: error });
  }
  if (typeof data !== 'string') {
    throw new SvgMetadataError('FetchFailure', `Response from ${url} is not text`);
  }
  checkSize(Buffer.byteLength(data, 'utf8'), limits);
  return data;
}

// ── Allowlist ─────────────────────────────────────────────────────

/** Absolute path with symlinks resolved where the path exists */
function canonicalPath(candidate: string): string {
  const absolute = path.resolve(candidate);
  return fs.existsSync(absolute) ? fs.realpathSync(absolute) : absolute;
}

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === ''
    || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * Whether `source` may be read under `config`. Literal XML text is always
 * allowed; paths must resolve inside an allowed root; URLs need `allowUrls`.
 */
export function isSourceAllowed(source: string, config: SourceAllowlist): boolean {
  switch (classifySource(source)) {
    case 'url':
      return config.allowUrls === true;
    case 'path': {
      const target = canonicalPath(source);
      return (config.allowedRoots ?? []).some(root => isInside(canonicalPath(root), target));
    }
    default:
      return true;
  }
}

/**
 * @throws SvgMetadataError `SourceNotAllowed` when `isSourceAllowed` refuses `source`
 */
export function assertSourceAllowed(source: string, config: SourceAllowlist): void {
  if (!isSourceAllowed(source, config)) {
    const roots = config.allowedRoots ?? [];
    throw new SvgMetadataError(
      'SourceNotAllowed',
      `Source blocked by allowlist: ${source}. Allowed roots: ${roots.length > 0 ? roots.join(', ') : '(none)'}`
    );
  }
}
