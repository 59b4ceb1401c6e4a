// ---------------------------------------------------------------------------
// Lazy paginated collections
//
// A ResourceStream fetches one page each time the consumer runs past the end
// of the previous one. Failures are yielded as values so the consumer decides
// which step to blame; the first failure ends the sequence.
// ---------------------------------------------------------------------------

export type StreamResult<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface Page {
  items: unknown[];
  /** Cursor for the following page, or null on the last page */
  next: string | null;
}

export type PageFetcher = (cursor: string | null) => Promise<Page>;

export class ResourceStream<T> implements AsyncIterable<StreamResult<T>> {
  constructor(
    private readonly fetchPage: PageFetcher,
    private readonly decode: (raw: unknown) => T,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<StreamResult<T>, void, undefined> {
    let cursor: string | null = null;
    do {
      let page: Page;
      try {
        page = await this.fetchPage(cursor);
      } catch (err) {
        yield { ok: false, error: toError(err) };
        return;
      }

      for (const raw of page.items) {
        let value: T;
        try {
          value = this.decode(raw);
        } catch (err) {
          yield { ok: false, error: toError(err) };
          return;
        }
        yield { ok: true, value };
      }

      cursor = page.next;
    } while (cursor !== null);
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Drain a stream, throwing the first failure it yields. */
export async function collect<T>(stream: AsyncIterable<StreamResult<T>>): Promise<T[]> {
  const items: T[] = [];
  for await (const result of stream) {
    if (!result.ok) throw result.error;
    items.push(result.value);
  }
  return items;
}

// ── Link header ─────────────────────────────────────────────────────────────

/**
 * Extract the `after` cursor from the `rel="next"` entry of an RFC 8288 Link
 * header. Okta may send the links as one comma-joined header or as several.
 */
export function nextCursorFromLink(header: string | string[] | undefined): string | null {
  if (!header) return null;
  const values = Array.isArray(header) ? header : [header];

  for (const value of values) {
    for (const link of value.split(/,\s*(?=<)/)) {
      const match = /^\s*<([^>]*)>\s*;(.*)$/.exec(link);
      if (!match) continue;
      const [, target, params] = match;
      if (!/\brel\s*=\s*"?next"?/i.test(params)) continue;
      try {
        return new URL(target).searchParams.get('after');
      } catch {
        // relative or malformed target; Okta always sends absolute URLs
        return null;
      }
    }
  }
  return null;
}
