import type { RawRecord } from '../types.js';
import { applyDirectives } from './directives.js';
import type { Directives } from './directives.js';

/**
 * Where a QuerySet gets its rows. `count` is optional: sources that can
 * count natively (honouring offset and limit) provide it.
 */
export interface ResultSource {
  fetch(directives: Directives): Promise<RawRecord[]>;
  count?(directives: Directives): Promise<number>;
}

/**
 * Source for backends without server-side ordering: candidates are loaded
 * once and every QuerySet derived from the same `find` shares them.
 */
export class MaterializedSource implements ResultSource {
  private candidates: Promise<RawRecord[]> | null = null;

  constructor(private readonly load: () => Promise<RawRecord[]>) {}

  static of(records: readonly RawRecord[]): MaterializedSource {
    return new MaterializedSource(async () => [...records]);
  }

  async fetch(directives: Directives): Promise<RawRecord[]> {
    return applyDirectives(await this.snapshot(), directives);
  }

  private snapshot(): Promise<RawRecord[]> {
    if (this.candidates === null) {
      this.candidates = this.load().catch((err: unknown) => {
        // Forget the failure so a later materialisation can retry the load.
        this.candidates = null;
        throw err;
      });
    }
    return this.candidates;
  }
}
