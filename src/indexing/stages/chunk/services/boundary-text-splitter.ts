import { TextSplitter, type TextSplitterParams } from '@langchain/textsplitters';

export const DEFAULT_BOUNDARIES = ['\n\n', '\n', '. ', ' '];

export interface BoundaryTextSplitterParams extends TextSplitterParams {
  boundaries: string[];
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits text into windows of at most `chunkSize` characters where
 * neighbours share exactly `chunkOverlap` characters.
 *
 * Each window ends right after the largest natural boundary (paragraph,
 * line, sentence, word) found in its second half; with none there, it is
 * cut hard at `chunkSize`. Output is never trimmed, so the same input
 * always yields the same windows.
 */
export class BoundaryTextSplitter
  extends TextSplitter
  implements BoundaryTextSplitterParams
{
  boundaries = DEFAULT_BOUNDARIES;

  constructor(fields?: Partial<BoundaryTextSplitterParams>) {
    super(fields);
    this.boundaries = fields?.boundaries ?? this.boundaries;
  }

  async splitText(text: string): Promise<string[]> {
    return this.splitSync(text);
  }

  splitSync(text: string): string[] {
    if (text.length <= this.chunkSize) {
      return text.length > 0 ? [text] : [];
    }

    const chunks: string[] = [];
    let start = 0;
    for (;;) {
      if (text.length - start <= this.chunkSize) {
        chunks.push(text.slice(start));
        return chunks;
      }

      const end = this.findEnd(text, start);
      chunks.push(text.slice(start, end));
      start = end - this.chunkOverlap;
    }
  }

  private findEnd(text: string, start: number): number {
    const limit = start + this.chunkSize;
    // a window must move forward and stay reasonably full
    const minEnd =
      start + Math.max(this.chunkOverlap + 1, Math.ceil(this.chunkSize / 2));

    for (const boundary of this.boundaries) {
      const index = text.lastIndexOf(boundary, limit - boundary.length);
      if (index >= 0 && index + boundary.length >= minEnd) {
        return index + boundary.length;
      }
    }
    // keep a surrogate pair in one window
    if (
      isHighSurrogate(text.charCodeAt(limit - 1)) &&
      limit - 1 > start + this.chunkOverlap
    ) {
      return limit - 1;
    }
    return limit;
  }
}
