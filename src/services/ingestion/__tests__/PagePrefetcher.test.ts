import { describe, it, expect } from 'vitest';
import { pageModel } from '../../../__fixtures__/pages.js';
import type { PageModel } from '../../../domain/entities/PageModel.js';
import { PagePrefetcher, type PageOutcome } from '../PagePrefetcher.js';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

async function collect(prefetcher: PagePrefetcher): Promise<PageOutcome[]> {
  const outcomes: PageOutcome[] = [];
  for await (const outcome of prefetcher.pages()) outcomes.push(outcome);
  return outcomes;
}

describe('PagePrefetcher', () => {
  it('yields pages in order even when later pages finish first', async () => {
    const delays: Record<number, number> = { 1: 30, 2: 0, 3: 10 };
    const load = async (pageNumber: number): Promise<PageModel> => {
      await sleep(delays[pageNumber] ?? 0);
      return pageModel(pageNumber);
    };

    const outcomes = await collect(new PagePrefetcher(load, 1, 3, 3));

    expect(outcomes.map(outcome => outcome.pageNumber)).toEqual([1, 2, 3]);
    expect(outcomes.every(outcome => outcome.ok)).toBe(true);
  });

  it('reports a failed page in its place without stopping', async () => {
    const load = async (pageNumber: number): Promise<PageModel> => {
      if (pageNumber === 2) throw new Error('corrupt content stream');
      return pageModel(pageNumber);
    };

    const outcomes = await collect(new PagePrefetcher(load, 1, 3, 2));

    expect(outcomes.map(outcome => [outcome.pageNumber, outcome.ok])).toEqual([
      [1, true],
      [2, false],
      [3, true],
    ]);
    expect(outcomes[1]).toEqual({ ok: false, pageNumber: 2, reason: 'corrupt content stream' });
  });

  it('keeps at most the window of pages in flight', async () => {
    let active = 0;
    let peak = 0;
    const started: number[] = [];
    const load = async (pageNumber: number): Promise<PageModel> => {
      started.push(pageNumber);
      active += 1;
      peak = Math.max(peak, active);
      await sleep(5);
      active -= 1;
      return pageModel(pageNumber);
    };

    const outcomes = await collect(new PagePrefetcher(load, 3, 7, 2));

    expect(outcomes.map(outcome => outcome.pageNumber)).toEqual([3, 4, 5, 6, 7]);
    expect(started).toEqual([3, 4, 5, 6, 7]);
    expect(peak).toBe(2);
  });

  it('yields nothing for an empty range', async () => {
    const outcomes = await collect(new PagePrefetcher(async pageNumber => pageModel(pageNumber), 1, 0, 4));
    expect(outcomes).toEqual([]);
  });
});
