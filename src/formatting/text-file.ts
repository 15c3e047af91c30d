import type { FileAttachment } from '../platform/types.js';

export type TextFileOptions = {
  /** Default `file.txt`. */
  fileName?: string;
  /** Prefix the name with `SPOILER_` so clients blur the file. */
  spoiler?: boolean;
};

/** Wrap text as an uploadable UTF-8 file, for output too long to pagify sensibly. */
export function textToFile(text: string, options: TextFileOptions = {}): FileAttachment {
  const name = options.fileName ?? 'file.txt';
  return {
    name: options.spoiler ? `SPOILER_${name}` : name,
    data: Buffer.from(text, 'utf8'),
  };
}
