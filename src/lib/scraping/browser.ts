import { chromium, Browser, BrowserContext, Page } from "playwright";
import { config } from "../config";
import { errorMessage } from "./utils";

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
];

const BLOCKED_RESOURCES = ["image", "font", "media"];

/** Read-only view of a rendered page handed to adapter extraction code */
export interface PageState {
  readonly url: string;
  hasElement(selector: string): Promise<boolean>;
  innerTexts(selector: string): Promise<string[]>;
}

/** One live browser instance. Closed sessions must not be navigated again. */
export interface BrowserSession {
  readonly id: number;
  isConnected(): boolean;
  goto(url: string): Promise<PageState>;
  clearCookies(): Promise<void>;
  clearStorage(): Promise<void>;
  close(): Promise<void>;
}

export interface SessionLauncher {
  launch(id: number): Promise<BrowserSession>;
}

/** Raised when a browser cannot be started. Halts the run. */
export class SessionFatalError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SessionFatalError";
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    readonly id: number,
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly timeoutMs: number
  ) {}

  isConnected(): boolean {
    return this.browser.isConnected();
  }

  async goto(url: string): Promise<PageState> {
    const page = this.page;
    await page.goto(url, { waitUntil: "load", timeout: this.timeoutMs });
    await page.evaluate("window.scrollTo(0, 0)");

    return {
      url,
      async hasElement(selector: string): Promise<boolean> {
        return (await page.locator(selector).count()) > 0;
      },
      async innerTexts(selector: string): Promise<string[]> {
        return page.locator(selector).allInnerTexts();
      },
    };
  }

  async clearCookies(): Promise<void> {
    await this.context.clearCookies();
  }

  async clearStorage(): Promise<void> {
    await this.page.evaluate("window.localStorage.clear(); window.sessionStorage.clear();");
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

export class PlaywrightLauncher implements SessionLauncher {
  constructor(
    private readonly options: { headless?: boolean; timeoutMs?: number } = {}
  ) {}

  async launch(id: number): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: this.options.headless ?? config.headless,
      args: LAUNCH_ARGS,
    });
    try {
      const context = await browser.newContext({
        userAgent: config.userAgents[0],
        viewport: { width: 1280, height: 720 },
      });
      const page = await context.newPage();

      // Images, fonts and media never carry a price
      await page.route("**/*", (route) => {
        if (BLOCKED_RESOURCES.includes(route.request().resourceType())) {
          return route.abort();
        }
        return route.continue();
      });

      return new PlaywrightSession(id, browser, context, page, this.options.timeoutMs ?? config.navigationTimeoutMs);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}

/**
 * Owns the one browser shared by every rendered-page adapter in a run.
 * The session is created lazily, dropped by `rotate`, and relaunched on
 * the next `acquire` after a rotation or a crash.
 */
export class RenderingSession {
  private current: BrowserSession | null = null;
  private launched = 0;
  private rotationCount = 0;

  constructor(private readonly launcher: SessionLauncher = new PlaywrightLauncher()) {}

  get rotations(): number {
    return this.rotationCount;
  }

  get active(): BrowserSession | null {
    return this.current;
  }

  async acquire(): Promise<BrowserSession> {
    if (this.current && !this.current.isConnected()) {
      console.warn(`[browser] Session ${this.current.id} disconnected, relaunching`);
      await this.dispose();
    }
    if (this.current) return this.current;

    const id = ++this.launched;
    try {
      this.current = await this.launcher.launch(id);
    } catch (error) {
      throw new SessionFatalError(`Failed to start rendering session: ${errorMessage(error)}`, error);
    }
    console.log(`[browser] Session ${id} started`);
    return this.current;
  }

  /**
   * Load `url` and run `extract` against it. Cookies are dropped before the
   * load; local and session storage are wiped after, even if `extract` throws.
   */
  async navigate<T>(url: string, extract: (page: PageState) => Promise<T>): Promise<T> {
    const session = await this.acquire();
    await session.clearCookies();
    try {
      const page = await session.goto(url);
      return await extract(page);
    } finally {
      await session.clearStorage().catch((error: unknown) => {
        console.warn(`[browser] Could not clear storage after ${url}: ${errorMessage(error)}`);
      });
    }
  }

  /** Close the live browser; the next navigation starts a fresh one */
  async rotate(): Promise<void> {
    await this.dispose();
    this.rotationCount++;
    console.log(`[browser] Rotating session (rotation ${this.rotationCount})`);
  }

  async dispose(): Promise<void> {
    const session = this.current;
    if (!session) return;
    this.current = null;
    try {
      await session.close();
    } catch (error) {
      console.warn(`[browser] Session ${session.id} did not close cleanly: ${errorMessage(error)}`);
    }
  }
}
