import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { RenderingSession, SessionFatalError } from "../lib/scraping/browser";
import { FakeLauncher } from "./helpers";

const URL_A = "https://www.e-fresh.gr/el/a";

describe("RenderingSession", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts the browser lazily and reuses it", async () => {
    const launcher = new FakeLauncher();
    const session = new RenderingSession(launcher);

    expect(session.active).toBeNull();
    const first = await session.acquire();
    const second = await session.acquire();

    expect(second).toBe(first);
    expect(launcher.sessions).toHaveLength(1);
  });

  it("clears cookies before and storage after each navigation", async () => {
    const launcher = new FakeLauncher({ [URL_A]: { ".price": ["1,00 €"] } });
    const session = new RenderingSession(launcher);

    const texts = await session.navigate(URL_A, (page) => page.innerTexts(".price"));

    expect(texts).toEqual(["1,00 €"]);
    expect(launcher.sessions[0].cookieClears).toBe(1);
    expect(launcher.sessions[0].storageClears).toBe(1);
  });

  it("clears storage even when extraction throws", async () => {
    const launcher = new FakeLauncher({ [URL_A]: {} });
    const session = new RenderingSession(launcher);

    await expect(
      session.navigate(URL_A, async () => {
        throw new Error("selector timeout");
      })
    ).rejects.toThrow("selector timeout");
    expect(launcher.sessions[0].storageClears).toBe(1);
  });

  it("rotate closes the current browser and the next acquire starts a fresh one", async () => {
    const launcher = new FakeLauncher();
    const session = new RenderingSession(launcher);
    const first = await session.acquire();

    await session.rotate();

    expect(launcher.sessions[0].closed).toBe(true);
    expect(session.active).toBeNull();
    expect(launcher.sessions).toHaveLength(1);
    expect(session.rotations).toBe(1);

    const next = await session.acquire();
    expect(next).not.toBe(first);
    expect(next.id).toBe(2);
  });

  it("relaunches a browser that crashed", async () => {
    const launcher = new FakeLauncher({ [URL_A]: { ".price": ["1,00 €"] } });
    const session = new RenderingSession(launcher);
    await session.acquire();
    launcher.sessions[0].closed = true;

    const texts = await session.navigate(URL_A, (page) => page.innerTexts(".price"));

    expect(texts).toEqual(["1,00 €"]);
    expect(launcher.sessions).toHaveLength(2);
    expect(launcher.sessions[1].visited).toEqual([URL_A]);
    expect(session.rotations).toBe(0);
  });

  it("dispose closes the browser and is a no-op without one", async () => {
    const launcher = new FakeLauncher();
    const session = new RenderingSession(launcher);
    await session.dispose();

    await session.acquire();
    await session.dispose();

    expect(launcher.sessions[0].closed).toBe(true);
    expect(session.active).toBeNull();
  });

  it("wraps launch failures in SessionFatalError", async () => {
    const launcher = new FakeLauncher();
    launcher.failWith = new Error("browserType.launch: Executable doesn't exist");
    const session = new RenderingSession(launcher);

    await expect(session.acquire()).rejects.toBeInstanceOf(SessionFatalError);
    await expect(session.acquire()).rejects.toThrow(
      "Failed to start rendering session: browserType.launch: Executable doesn't exist"
    );
  });
});
