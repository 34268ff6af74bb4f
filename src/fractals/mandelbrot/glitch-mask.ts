/**
 * Boolean mask of the pixels that need re-rendering after a glitch pass.
 * A diagnostic and visualization aid, so expansion is the plain neighbour scan.
 */
export class GlitchMask {
  private mask: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.mask = new Uint8Array(width * height);
  }

  static fromFlags(flags: ArrayLike<number>, width: number, height: number): GlitchMask {
    const mask = new GlitchMask(width, height);
    mask.updateFromFlags(flags);
    return mask;
  }

  /**
   * Marks every pixel with a nonzero glitch flag.
   */
  updateFromFlags(flags: ArrayLike<number>): void {
    const total = this.width * this.height;
    if (flags.length < total) {
      throw new Error(`GlitchMask: flag buffer holds ${flags.length} values, expected ${total}`);
    }
    for (let i = 0; i < total; i++) {
      this.mask[i] = flags[i] > 0 ? 1 : 0;
    }
  }

  /**
   * Grow the mask by `radius` pixels in every direction (square neighbourhood)
   * to catch edge artifacts around glitched areas.
   */
  expand(radius: number): void {
    if (radius <= 0) return;

    const { width, height } = this;
    const expanded = this.mask.slice();

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (!this.mask[y * width + x]) continue;

        for (let dy = -radius; dy <= radius; dy++) {
          const ny = y + dy;
          if (ny < 0 || ny >= height) continue;
          for (let dx = -radius; dx <= radius; dx++) {
            const nx = x + dx;
            if (nx >= 0 && nx < width) {
              expanded[ny * width + nx] = 1;
            }
          }
        }
      }
    }

    this.mask = expanded;
  }

  needsRerender(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return false;
    }
    return this.mask[y * this.width + x] === 1;
  }

  /** Number of pixels needing re-render */
  get count(): number {
    let total = 0;
    for (const marked of this.mask) {
      total += marked;
    }
    return total;
  }

  reset(): void {
    this.mask.fill(0);
  }
}
