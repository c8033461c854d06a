import type { PageModel } from '../../domain/entities/PageModel.js';

export type PageOutcome =
  | { readonly ok: true; readonly pageNumber: number; readonly page: PageModel }
  | { readonly ok: false; readonly pageNumber: number; readonly reason: string };

export type PageLoader = (pageNumber: number) => Promise<PageModel>;

/**
 * Extracts pages ahead of the consumer in a bounded window and hands them
 * over strictly in page order. Outcomes never reject: a failed page arrives
 * as `{ ok: false }` in its place.
 */
export class PagePrefetcher {
  constructor(
    private readonly load: PageLoader,
    private readonly firstPage: number,
    private readonly lastPage: number,
    private readonly window: number
  ) {}

  async *pages(): AsyncGenerator<PageOutcome> {
    const inflight: Array<Promise<PageOutcome>> = [];
    let next = this.firstPage;

    const fill = (): void => {
      while (inflight.length < Math.max(1, this.window) && next <= this.lastPage) {
        inflight.push(this.settle(next));
        next += 1;
      }
    };

    fill();
    while (inflight.length > 0) {
      const head = inflight.shift();
      if (!head) break;
      const outcome = await head;
      fill();
      yield outcome;
    }
  }

  private settle(pageNumber: number): Promise<PageOutcome> {
    return this.load(pageNumber).then(
      (page): PageOutcome => ({ ok: true, pageNumber, page }),
      (error: unknown): PageOutcome => ({
        ok: false,
        pageNumber,
        reason: error instanceof Error ? error.message : String(error),
      })
    );
  }
}
