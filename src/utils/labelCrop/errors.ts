/** Invalid configuration; raised before any document is read. */
export class LabelConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid label crop configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'LabelConfigError';
  }
}

/** The caller's AbortSignal fired between two units of work. */
export class LabelCropCancelledError extends Error {
  constructor() {
    super('Label crop run cancelled');
    this.name = 'LabelCropCancelledError';
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new LabelCropCancelledError();
}

/** Message text of anything thrown */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
