export const DEFAULT_NO_PROGRESS_LIMIT = 2;

export interface StagnationDetectorOptions {
  noProgressLimit?: number;
}

interface ScoreTrack {
  lastScore: number;
  repeats: number;
}

/**
 * Signals no progress once `noProgressLimit` consecutive observations repeat
 * the score before them exactly. Any change resets the count.
 */
export class StagnationDetector {
  private readonly limit: number;
  private readonly tracks = new Map<string, ScoreTrack>();

  constructor(options: StagnationDetectorOptions = {}) {
    this.limit = Math.max(1, Math.floor(options.noProgressLimit ?? DEFAULT_NO_PROGRESS_LIMIT));
  }

  observe(stepKind: string, score: number): boolean {
    const track = this.tracks.get(stepKind);

    if (!track || track.lastScore !== score) {
      this.tracks.set(stepKind, { lastScore: score, repeats: 0 });
      return false;
    }

    track.repeats += 1;
    return track.repeats >= this.limit;
  }

  lastScore(stepKind: string): number | null {
    return this.tracks.get(stepKind)?.lastScore ?? null;
  }

  consecutiveRepeats(stepKind: string): number {
    return this.tracks.get(stepKind)?.repeats ?? 0;
  }

  reset(stepKind: string): void {
    this.tracks.delete(stepKind);
  }
}
