import type { BrowserSession, PageState, SessionLauncher } from "../lib/scraping/browser";
import type { ResultSink } from "../lib/sink/types";
import type { DiagnosticEntry, Quote, ReconciliationResult } from "../lib/types";

/** Selector → inner texts of every matching element */
export type FakeDom = Record<string, string[]>;

export function fakePage(url: string, dom: FakeDom): PageState {
  return {
    url,
    async hasElement(selector: string) {
      return (dom[selector]?.length ?? 0) > 0;
    },
    async innerTexts(selector: string) {
      return dom[selector] ?? [];
    },
  };
}

export class FakeBrowserSession implements BrowserSession {
  closed = false;
  cookieClears = 0;
  storageClears = 0;
  visited: string[] = [];

  constructor(
    readonly id: number,
    private readonly pages: Record<string, FakeDom>
  ) {}

  isConnected(): boolean {
    return !this.closed;
  }

  async goto(url: string): Promise<PageState> {
    if (this.closed) throw new Error(`session ${this.id} is closed`);
    this.visited.push(url);
    const dom = this.pages[url];
    if (!dom) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    return fakePage(url, dom);
  }

  async clearCookies(): Promise<void> {
    this.cookieClears++;
  }

  async clearStorage(): Promise<void> {
    this.storageClears++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeLauncher implements SessionLauncher {
  sessions: FakeBrowserSession[] = [];
  failWith: Error | null = null;

  constructor(private readonly pages: Record<string, FakeDom> = {}) {}

  async launch(id: number): Promise<BrowserSession> {
    if (this.failWith) throw this.failWith;
    const session = new FakeBrowserSession(id, this.pages);
    this.sessions.push(session);
    return session;
  }
}

export class MemorySink implements ResultSink {
  diagnostics: DiagnosticEntry[] = [];
  tables: ReconciliationResult[][] = [];

  async appendDiagnostic(entry: DiagnosticEntry): Promise<void> {
    this.diagnostics.push(entry);
  }

  async writeFinalTable(rows: ReconciliationResult[]): Promise<void> {
    this.tables.push(rows);
  }
}

export function makeQuote(overrides: Partial<Quote> = {}): Quote {
  return {
    sourceId: "mymarket.gr",
    rawPriceText: null,
    storeCount: 0,
    aggregatorReferencePrice: null,
    ...overrides,
  };
}
