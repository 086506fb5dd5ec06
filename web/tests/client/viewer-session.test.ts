import type { ViewerDocument } from "../../client/src/document/Document";
import { documentMetadata } from "../../client/src/document/Document";
import { UnsupportedOperationError } from "../../client/src/errors";
import { MemorySettingsStore } from "../../client/src/settings/SettingsStore";
import { IDENTITY_TRANSFORM } from "../../client/src/transform/TransformModel";
import type { ViewerSessionOptions } from "../../client/src/viewer/ViewerSession";
import { ViewerSession, formatZoom } from "../../client/src/viewer/ViewerSession";
import { deferredDecoder, deferredScanner, raster, tableDecoder, tableScanner, vector } from "./fixtures";

const screen = { width: 800, height: 600 };

const library: Record<string, ViewerDocument | Error> = {
  "/photos/a.png": raster("/photos/a.png", 1600, 1200),
  "/photos/b.png": new Error("bad data"),
  "/photos/c.jpg": raster("/photos/c.jpg", 200, 150),
  "/photos/d.svg": vector("/photos/d.svg", 400, 300),
};

const listings = {
  "/photos": ["/photos/d.svg", "/photos/c.jpg", "/photos/b.png", "/photos/a.png", "/photos/notes.txt"],
  "/empty": ["/empty/readme.md"],
};

const createSession = (overrides: Partial<ViewerSessionOptions> = {}) => {
  const scanner = tableScanner(listings);
  const session = new ViewerSession({
    decoder: tableDecoder(library),
    scanner,
    ...overrides,
  });
  session.setViewportSize(screen);
  return { session, scanner };
};

test("opening a folder loads its first supported document", async () => {
  const { session } = createSession();
  const outcome = await session.openDirectory("/photos");
  expect(outcome.status).toBe("loaded");
  expect(session.currentPath).toBe("/photos/a.png");
  expect(session.status()).toEqual({ zoomDisplay: "Fit", positionLabel: "1 / 4", dimensions: "1600 × 1200" });
  expect(session.zoomFactor).toBe(0.5);
});

test("a folder without supported documents is reported empty", async () => {
  const { session } = createSession();
  expect(await session.openDirectory("/empty")).toEqual({ status: "empty", directory: "/empty" });
  expect(session.currentPath).toBeNull();
  expect(session.status()).toEqual({ zoomDisplay: "Fit", positionLabel: "", dimensions: "" });
});

test("a failed decode keeps the previous document on screen", async () => {
  const { session } = createSession();
  await session.openDirectory("/photos");
  const outcome = await session.next();
  expect(outcome.status).toBe("failed");
  expect(session.currentPath).toBe("/photos/a.png");
  expect(session.error?.message).toBe("Failed to open /photos/b.png: bad data");
  expect(session.status().positionLabel).toBe("2 / 4");

  await session.next();
  expect(session.currentPath).toBe("/photos/c.jpg");
  expect(session.error).toBeNull();
  expect(session.status().positionLabel).toBe("3 / 4");
});

test("navigation stops at the last document", async () => {
  const { session } = createSession();
  await session.openPath("/photos/d.svg");
  expect(await session.next()).toEqual({ status: "at-boundary" });
  expect(session.currentPath).toBe("/photos/d.svg");
});

test("wrapping navigation is opt-in", async () => {
  const { session } = createSession({ options: { wrapNavigation: true } });
  await session.openPath("/photos/d.svg");
  await session.next();
  expect(session.currentPath).toBe("/photos/a.png");
});

test("opening a path scans its folder once", async () => {
  const { session, scanner } = createSession();
  await session.openPath("/photos/c.jpg");
  await session.openPath("/photos/a.png");
  expect(scanner.calls).toEqual(["/photos"]);
  expect(session.navigationEntries()).toEqual(["/photos/a.png", "/photos/b.png", "/photos/c.jpg", "/photos/d.svg"]);
  expect(session.status().positionLabel).toBe("1 / 4");
});

test("a newer open wins over a slower earlier one", async () => {
  const { decoder, get } = deferredDecoder();
  const { session } = createSession({ decoder });
  const first = session.openPath("/photos/a.png");
  const second = session.openPath("/photos/c.jpg");
  get("/photos/c.jpg").resolve(raster("/photos/c.jpg", 200, 150));
  expect((await second).status).toBe("loaded");
  get("/photos/a.png").resolve(raster("/photos/a.png", 1600, 1200));
  expect((await first).status).toBe("stale");
  expect(session.currentPath).toBe("/photos/c.jpg");
});

test("a folder listing that arrives after a newer request is discarded", async () => {
  const { scanner, finish } = deferredScanner();
  const { session } = createSession({
    scanner,
    decoder: tableDecoder({
      "/one/a.png": raster("/one/a.png", 100, 100),
      "/two/b.png": raster("/two/b.png", 300, 200),
    }),
  });
  const first = session.openDirectory("/one");
  const second = session.openDirectory("/two");
  finish("/two", ["/two/b.png"]);
  expect((await second).status).toBe("loaded");
  finish("/one", ["/one/a.png"]);
  expect((await first).status).toBe("stale");
  expect(session.currentPath).toBe("/two/b.png");
  expect(session.navigationEntries()).toEqual(["/two/b.png"]);
});

test("opening another document while a folder is scanned wins", async () => {
  const { scanner, finish } = deferredScanner(listings);
  const { session } = createSession({ scanner });
  const listing = session.openDirectory("/slow");
  const opened = session.openPath("/photos/c.jpg");
  expect((await opened).status).toBe("loaded");
  finish("/slow", ["/slow/x.png"]);
  expect(await listing).toEqual({ status: "stale", path: "/slow", generation: 1 });
  expect(session.currentPath).toBe("/photos/c.jpg");
  expect(session.status().positionLabel).toBe("3 / 4");
});

test("replaced and stale documents are released", async () => {
  const decoder = tableDecoder(library);
  const { session } = createSession({ decoder });
  await session.openDirectory("/photos");
  await session.openPath("/photos/c.jpg");
  expect(decoder.released).toEqual(["/photos/a.png"]);
  session.dispose();
  expect(decoder.released).toEqual(["/photos/a.png", "/photos/c.jpg"]);
  expect(session.currentPath).toBeNull();
});

test("switching documents resets transform, zoom and pan", async () => {
  const { session } = createSession();
  await session.openDirectory("/photos");
  session.rotateClockwise();
  session.setZoom(2);
  session.pan({ x: 100, y: 100 });
  await session.openPath("/photos/c.jpg");
  expect(session.transform).toEqual(IDENTITY_TRANSFORM);
  const viewport = session.viewportSnapshot();
  expect(viewport.mode).toEqual({ kind: "fit" });
  expect(viewport.panOffset).toEqual({ x: 0, y: 0 });
  expect(viewport.zoomFactor).toBe(4);
});

test("rotating a raster swaps its dimensions and refits", async () => {
  const { session } = createSession();
  await session.openDirectory("/photos");
  const result = session.rotateClockwise();
  expect(result).toEqual({ ok: true, value: { rotation: 90, flipHorizontal: false, flipVertical: false } });
  expect(session.status().dimensions).toBe("1200 × 1600");
  expect(session.zoomFactor).toBe(0.375);
  expect(session.surface()?.effectiveSize).toEqual({ width: 1200, height: 1600 });
});

test("vector documents refuse transforms", async () => {
  const { session } = createSession();
  await session.openPath("/photos/d.svg");
  const result = session.rotateClockwise();
  if (result.ok) {
    throw new Error("expected rotation to be refused");
  }
  expect(result.error).toBeInstanceOf(UnsupportedOperationError);
  expect(result.error.message).toBe("rotate-cw is not supported: vector documents do not accept transforms");
  expect(session.transform).toEqual(IDENTITY_TRANSFORM);
  expect(session.getSnapshot().error).toBe(result.error.message);
});

test("transforms without a document are refused", () => {
  const { session } = createSession();
  const result = session.flipHorizontal();
  expect(result.ok).toBe(false);
  expect(!result.ok && result.error.message).toBe("flip-horizontal is not supported: no document is open");
});

test("zoom display follows the view mode", async () => {
  const { session } = createSession();
  await session.openDirectory("/photos");
  session.actualSize();
  expect(session.status().zoomDisplay).toBe("100%");
  session.zoomIn();
  expect(session.status().zoomDisplay).toBe("110%");
  expect(formatZoom({ kind: "custom", factor: 0.333 }, 0.333)).toBe("33%");
});

test("keyboard pan steps use the configured distance", async () => {
  const { session } = createSession({ options: { panStep: 80 } });
  await session.openDirectory("/photos");
  session.actualSize();
  expect(session.panStep("right")).toBe(true);
  expect(session.panStep("up")).toBe(true);
  expect(session.viewportSnapshot().panOffset).toEqual({ x: 80, y: -80 });
  session.resetPan();
  expect(session.viewportSnapshot().panOffset).toEqual({ x: 0, y: 0 });
});

test("tool modes toggle exclusively", () => {
  const { session } = createSession();
  expect(session.toggleToolMode("crop")).toBe("crop");
  expect(session.toggleToolMode("scale")).toBe("scale");
  expect(session.toggleToolMode("scale")).toBe("none");
});

test("panel visibility is persisted", async () => {
  const store = new MemorySettingsStore();
  const { session } = createSession({ settingsStore: store });
  expect(session.togglePanel("metadata")).toBe(true);
  await session.flushSettings();
  expect(store.saves).toBe(1);
  expect((await store.load()).panels).toEqual({ navigation: false, metadata: true });
});

test("saved settings are restored on load", async () => {
  const store = new MemorySettingsStore({ defaultDirectory: "/photos", panels: { navigation: true, metadata: false } });
  const { session } = createSession({ settingsStore: store });
  const settings = await session.loadSettings();
  expect(settings.defaultDirectory).toBe("/photos");
  expect(session.defaultDirectory).toBe("/photos");
  expect(session.getSnapshot().panels).toEqual({ navigation: true, metadata: false });
});

test("a failing settings store does not block the session", async () => {
  const { session } = createSession({
    settingsStore: {
      load: () => Promise.reject(new Error("disk full")),
      save: () => Promise.reject(new Error("disk full")),
    },
  });
  const settings = await session.loadSettings();
  expect(settings.panels).toEqual({ navigation: false, metadata: false });
  session.togglePanel("navigation");
  await session.flushSettings();
  expect(session.getSnapshot().panels.navigation).toBe(true);
});

test("metadata is extracted once per document", async () => {
  let extractions = 0;
  const { session } = createSession({
    metadataExtractor: {
      extract: (document) => {
        extractions += 1;
        return documentMetadata(document);
      },
    },
  });
  expect(session.metadata()).toBeNull();
  await session.openDirectory("/photos");
  expect(session.metadata()?.fileName).toBe("a.png");
  session.metadata();
  expect(extractions).toBe(1);
  await session.openPath("/photos/c.jpg");
  expect(session.metadata()?.fileName).toBe("c.jpg");
  expect(extractions).toBe(2);
});

test("subscribers see each change and snapshots are stable between changes", async () => {
  const { session } = createSession();
  const seen: string[] = [];
  const unsubscribe = session.subscribe((snapshot) => seen.push(snapshot.status.zoomDisplay));
  await session.openDirectory("/photos");
  session.actualSize();
  expect(seen[seen.length - 1]).toBe("100%");
  expect(session.getSnapshot()).toBe(session.getSnapshot());
  unsubscribe();
  const count = seen.length;
  session.toggleFit();
  expect(seen.length).toBe(count);
});
