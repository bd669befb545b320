let graphemeSegmenter: Intl.Segmenter | null = null;

function getGraphemeSegmenter(): Intl.Segmenter {
  graphemeSegmenter = graphemeSegmenter ?? new Intl.Segmenter(undefined, { granularity: 'grapheme' });
  return graphemeSegmenter;
}

/**
 * Navigation over the grapheme-cluster starts of one paragraph.
 * Offsets are UTF-16 code units, ascending.
 */
export class GraphemeCursor {
  private readonly offsets: number[];
  private readonly graphemes: Map<number, string>;

  private constructor(offsets: number[], graphemes: Map<number, string>) {
    this.offsets = offsets;
    this.graphemes = graphemes;
  }

  static fromText(text: string): GraphemeCursor {
    const offsets: number[] = [];
    const graphemes = new Map<number, string>();
    for (const part of getGraphemeSegmenter().segment(text)) {
      offsets.push(part.index);
      graphemes.set(part.index, part.segment);
    }
    return new GraphemeCursor(offsets, graphemes);
  }

  get graphemeOffsets(): readonly number[] {
    return this.offsets;
  }

  has(offset: number): boolean {
    return this.graphemes.has(offset);
  }

  /**
   * The grapheme cluster starting at `offset`, if a cluster starts there
   */
  graphemeAt(offset: number): string | undefined {
    return this.graphemes.get(offset);
  }

  /**
   * Smallest recorded offset strictly greater than `offset`
   */
  next(offset: number): number | undefined {
    let low = 0;
    let high = this.offsets.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if ((this.offsets[mid] ?? Infinity) <= offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return this.offsets[low];
  }

  /**
   * Largest recorded offset strictly smaller than `offset`
   */
  prev(offset: number): number | undefined {
    let low = 0;
    let high = this.offsets.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if ((this.offsets[mid] ?? Infinity) < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low > 0 ? this.offsets[low - 1] : undefined;
  }
}
