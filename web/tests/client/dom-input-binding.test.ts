import { DomInputBinding } from "../../client/src/viewer/DomInputBinding";
import type { InputSurface, SurfaceRect } from "../../client/src/viewer/DomInputBinding";
import type { CommandOutcome } from "../../client/src/viewer/InputReconciler";
import { InputReconciler } from "../../client/src/viewer/InputReconciler";
import { ViewerSession } from "../../client/src/viewer/ViewerSession";
import { raster, tableDecoder, tableScanner } from "./fixtures";

class FakeSurface extends EventTarget implements InputSurface {
  rect: SurfaceRect = { left: 10, top: 20, width: 800, height: 600 };
  captured: number[] = [];

  getBoundingClientRect(): SurfaceRect {
    return this.rect;
  }

  setPointerCapture(pointerId: number): void {
    this.captured.push(pointerId);
  }
}

const event = (type: string, fields: Record<string, number | string | boolean>) =>
  Object.assign(new Event(type, { cancelable: true }), fields);

const setup = async () => {
  const session = new ViewerSession({
    decoder: tableDecoder({
      "/pics/a.png": raster("/pics/a.png", 1600, 1200),
      "/pics/b.png": raster("/pics/b.png", 100, 100),
    }),
    scanner: tableScanner({ "/pics": ["/pics/a.png", "/pics/b.png"] }),
  });
  await session.openPath("/pics/a.png");
  const surface = new FakeSurface();
  const windowTarget = new EventTarget();
  const outcomes: CommandOutcome[] = [];
  const reconciler = new InputReconciler(session);
  const binding = new DomInputBinding(surface, reconciler, {
    pointerTarget: windowTarget,
    keyTarget: windowTarget,
    resizeTarget: windowTarget,
    onOutcome: (outcome) => outcomes.push(outcome),
  });
  return { session, surface, windowTarget, outcomes, reconciler, binding };
};

test("binding measures the surface on attach", async () => {
  const { session } = await setup();
  expect(session.viewportSnapshot().viewportSize).toEqual({ width: 800, height: 600 });
  expect(session.zoomFactor).toBe(0.5);
});

test("wheel events zoom around the pointer position", async () => {
  const { session, surface } = await setup();
  session.actualSize();
  const wheel = event("wheel", { clientX: 210, clientY: 170, deltaY: -100 });
  surface.dispatchEvent(wheel);
  expect(wheel.defaultPrevented).toBe(true);
  expect(session.zoomFactor).toBe(1.1);
  const anchored = session.toDocument({ x: 200, y: 150 });
  expect(anchored?.x).toBeCloseTo(600);
  expect(anchored?.y).toBeCloseTo(450);
});

test("pointer drags pan while the captured pointer moves", async () => {
  const { session, surface, windowTarget, reconciler } = await setup();
  session.actualSize();
  surface.dispatchEvent(event("pointerdown", { pointerId: 7, button: 0, clientX: 410, clientY: 320 }));
  expect(surface.captured).toEqual([7]);
  windowTarget.dispatchEvent(event("pointermove", { pointerId: 7, clientX: 310, clientY: 270 }));
  windowTarget.dispatchEvent(event("pointermove", { pointerId: 8, clientX: 0, clientY: 0 }));
  expect(session.viewportSnapshot().panOffset).toEqual({ x: 100, y: 50 });
  windowTarget.dispatchEvent(event("pointerup", { pointerId: 7, clientX: 310, clientY: 270 }));
  expect(reconciler.dragging).toBe(false);
});

test("secondary buttons do not start a drag", async () => {
  const { surface, reconciler } = await setup();
  surface.dispatchEvent(event("pointerdown", { pointerId: 1, button: 2, clientX: 0, clientY: 0 }));
  expect(reconciler.dragging).toBe(false);
  expect(surface.captured).toEqual([]);
});

test("mapped keys are consumed and unmapped keys pass through", async () => {
  const { session, windowTarget, outcomes } = await setup();
  session.actualSize();
  const pan = event("keydown", { key: "ArrowRight", ctrlKey: true });
  windowTarget.dispatchEvent(pan);
  expect(pan.defaultPrevented).toBe(true);
  expect(session.viewportSnapshot().panOffset).toEqual({ x: 50, y: 0 });
  expect(outcomes).toEqual([{ kind: "applied" }]);

  const other = event("keydown", { key: "q" });
  windowTarget.dispatchEvent(other);
  expect(other.defaultPrevented).toBe(false);
  expect(outcomes.length).toBe(1);
});

test("navigation keys hand back the pending load", async () => {
  const { session, windowTarget, outcomes } = await setup();
  windowTarget.dispatchEvent(event("keydown", { key: "ArrowRight" }));
  const outcome = outcomes[0];
  if (outcome?.kind !== "pending") {
    throw new Error("expected a pending navigation");
  }
  await outcome.result;
  expect(session.currentPath).toBe("/pics/b.png");
});

test("resize events re-measure the surface", async () => {
  const { session, surface, windowTarget } = await setup();
  surface.rect = { left: 0, top: 0, width: 400, height: 300 };
  windowTarget.dispatchEvent(new Event("resize"));
  expect(session.viewportSnapshot().viewportSize).toEqual({ width: 400, height: 300 });
});

test("dispose detaches every listener", async () => {
  const { session, surface, windowTarget, binding } = await setup();
  session.actualSize();
  binding.dispose();
  surface.dispatchEvent(event("wheel", { clientX: 210, clientY: 170, deltaY: -100 }));
  windowTarget.dispatchEvent(event("keydown", { key: "ArrowRight", ctrlKey: true }));
  expect(session.zoomFactor).toBe(1);
  expect(session.viewportSnapshot().panOffset).toEqual({ x: 0, y: 0 });
});

class FakeField extends EventTarget {
  constructor(readonly tagName: string, readonly isContentEditable = false) {
    super();
  }
}

test("keys typed into text fields are left alone", async () => {
  const { session, surface, reconciler, binding } = await setup();
  binding.dispose();
  for (const field of [new FakeField("input"), new FakeField("TEXTAREA"), new FakeField("DIV", true)]) {
    const fieldBinding = new DomInputBinding(surface, reconciler, { keyTarget: field });
    const typed = event("keydown", { key: "s" });
    field.dispatchEvent(typed);
    expect(typed.defaultPrevented).toBe(false);
    fieldBinding.dispose();
  }
  expect(session.toolMode).toBe("none");
});

test("keys on other elements still run commands", async () => {
  const { session, surface, reconciler, binding } = await setup();
  binding.dispose();
  const button = new FakeField("BUTTON");
  const buttonBinding = new DomInputBinding(surface, reconciler, { keyTarget: button });
  const pressed = event("keydown", { key: "s" });
  button.dispatchEvent(pressed);
  expect(pressed.defaultPrevented).toBe(true);
  expect(session.toolMode).toBe("scale");
  buttonBinding.dispose();
});

test("events without pointer coordinates are ignored", async () => {
  const { session, surface } = await setup();
  session.actualSize();
  const bare = event("wheel", { deltaY: -100 });
  surface.dispatchEvent(bare);
  expect(bare.defaultPrevented).toBe(false);
  expect(session.zoomFactor).toBe(1);
});
