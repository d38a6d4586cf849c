import type { CatalogPage, CatalogProvider, CatalogQuery } from '@tessera/core';

export interface CatalogItem {
  code: string;
}

export interface FakeCatalogOptions {
  /** Offsets at or past this window are refused, like the real search endpoint. */
  window: number;
  /** Errors thrown for every request on an exact prefix. */
  failures?: Record<string, () => Error>;
}

/**
 * Prefix-matching catalog over a fixed list of codes; records every request it serves.
 * `toItem` turns a matching code into the item handed out.
 */
export class FakeCatalog<T> implements CatalogProvider<T> {
  readonly name = 'fake_catalog';
  probes: string[] = [];
  pages: { prefix: string; offset: number; size: number }[] = [];

  constructor(
    private codes: readonly string[],
    private options: FakeCatalogOptions,
    private toItem: (code: string) => T,
  ) {}

  private matching(query: CatalogQuery): string[] {
    return this.codes.filter((c) => c.startsWith(query.prefix));
  }

  private failFor(prefix: string): void {
    const failure = this.options.failures?.[prefix];
    if (failure) throw failure();
  }

  async probeCount(query: CatalogQuery): Promise<number> {
    this.probes.push(query.prefix);
    this.failFor(query.prefix);
    return this.matching(query).length;
  }

  async fetchPage(query: CatalogQuery, offset: number, pageSize: number): Promise<CatalogPage<T>> {
    this.pages.push({ prefix: query.prefix, offset, size: pageSize });
    this.failFor(query.prefix);
    if (offset + pageSize > this.options.window) {
      throw new Error(`offset ${offset} + ${pageSize} exceeds window ${this.options.window}`);
    }
    const all = this.matching(query);
    return {
      totalHits: all.length,
      items: all.slice(offset, offset + pageSize).map((code) => this.toItem(code)),
    };
  }
}

export function codeCatalog(
  codes: readonly string[],
  options: FakeCatalogOptions,
): FakeCatalog<CatalogItem> {
  return new FakeCatalog(codes, options, (code) => ({ code }));
}

/** Every three-letter code over `alphabet`, in order. */
export function threeLetterCodes(alphabet: string): string[] {
  const codes: string[] = [];
  for (const a of alphabet) {
    for (const b of alphabet) {
      for (const c of alphabet) codes.push(a + b + c);
    }
  }
  return codes;
}

export const noSleep = async (_ms: number): Promise<void> => {};
