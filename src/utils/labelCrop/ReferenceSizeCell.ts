import type { ReferenceSize } from './types';

/**
 * Single-assignment holder for the run's output page size.
 *
 * Exactly one `trySet` succeeds per cell; later calls leave the stored size
 * untouched and report `false`. Readers that need the size call `require()`,
 * which throws when no write has happened yet.
 */
export class ReferenceSizeCell {
  private value: Readonly<ReferenceSize> | null = null;

  constructor(initial?: ReferenceSize) {
    if (initial) this.trySet(initial);
  }

  /** Compare-and-set from unset. Returns true only for the winning write. */
  trySet(size: ReferenceSize): boolean {
    if (this.value !== null) return false;
    this.value = Object.freeze({ width: size.width, height: size.height });
    return true;
  }

  get(): Readonly<ReferenceSize> | null {
    return this.value;
  }

  isSet(): boolean {
    return this.value !== null;
  }

  require(): Readonly<ReferenceSize> {
    if (this.value === null) {
      throw new Error('Reference size read before the first label established it');
    }
    return this.value;
  }
}
