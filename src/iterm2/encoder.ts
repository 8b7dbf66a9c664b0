/**
 * iTerm2 Inline Images Protocol Encoder
 *
 * Single sequence:
 * ```
 * ESC ] 1337 ; File = [params] : <base64-data> BEL
 * ```
 *
 * Multipart sequence (tmux):
 * ```
 * ESC ] 1337 ; MultipartFile = [params] BEL
 * ESC ] 1337 ; FilePart = <base64-chunk> BEL
 * ...
 * ESC ] 1337 ; FileEnd BEL
 * ```
 */

import { encodeGridToPng } from '../image/png.ts';
import { getLogger } from '../logging.ts';
import { ITERM_MULTIPART_CHUNK_SIZE, type ITermEncodeOptions, type ITermOutput } from './types.ts';

const logger = getLogger('ITermEncoder');

export function buildParams(options: {
  displayWidth?: number;
  displayHeight?: number;
  preserveAspectRatio?: boolean;
  size: number;
}): string {
  // inline=1 displays the image instead of downloading it
  const params: string[] = ['inline=1'];

  if (options.displayWidth !== undefined) {
    params.push(`width=${options.displayWidth}`);
  }
  if (options.displayHeight !== undefined) {
    params.push(`height=${options.displayHeight}`);
  }
  // Default is 1
  if (options.preserveAspectRatio === false) {
    params.push('preserveAspectRatio=0');
  }
  params.push(`size=${options.size}`);

  return params.join(';');
}

function encodeMultipartSequences(base64Data: string, params: string, chunkSize: number): string[] {
  const sequences: string[] = [`\x1b]1337;MultipartFile=${params}\x07`];
  for (let i = 0; i < base64Data.length; i += chunkSize) {
    sequences.push(`\x1b]1337;FilePart=${base64Data.slice(i, i + chunkSize)}\x07`);
  }
  sequences.push('\x1b]1337;FileEnd\x07');
  return sequences;
}

/**
 * PNG-encode the grid and wrap it in iTerm2 escape sequence(s).
 */
export function encodeToITerm2(options: ITermEncodeOptions): ITermOutput {
  const {
    image,
    displayWidth,
    displayHeight,
    preserveAspectRatio = true,
    useMultipart = false,
  } = options;

  const pngBytes = encodeGridToPng(image);
  const base64Data = Buffer.from(pngBytes.buffer, pngBytes.byteOffset, pngBytes.byteLength).toString('base64');
  const params = buildParams({ displayWidth, displayHeight, preserveAspectRatio, size: pngBytes.length });

  const sequences = useMultipart
    ? encodeMultipartSequences(base64Data, params, ITERM_MULTIPART_CHUNK_SIZE)
    : [`\x1b]1337;File=${params}:${base64Data}\x07`];

  logger.debug('iTerm2 encoding complete', {
    width: image.width,
    height: image.height,
    useMultipart,
    sequences: sequences.length,
    totalBytes: base64Data.length,
  });

  return { sequences, pngBytes, totalBytes: base64Data.length };
}
