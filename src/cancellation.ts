import { ProgressCallback } from "./types";

/**
 * Caller-owned cancellation flag for one scan or migration job. Long-running
 * operations poll it between items; nothing is interrupted mid-file.
 */
export class CancellationToken {
  private requested = false;

  cancel(): void {
    this.requested = true;
  }

  get isCancellationRequested(): boolean {
    return this.requested;
  }

  static none(): CancellationToken {
    return new CancellationToken();
  }
}

export interface JobHooks {
  onProgress?: ProgressCallback;
  token?: CancellationToken;
}
