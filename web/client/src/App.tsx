import React, { useCallback, useEffect, useRef, useState, useSyncExternalStore } from "react";
import type { RenderableSurface } from "./document/Document";
import { fileNameOf } from "./document/Document";
import { metadataRows } from "./document/metadata";
import { describeError } from "./errors";
import { Logger } from "./logger";
import { DomInputBinding } from "./viewer/DomInputBinding";
import type { CommandOutcome } from "./viewer/InputReconciler";
import { InputReconciler } from "./viewer/InputReconciler";
import type { ViewerCommand } from "./viewer/commands";
import type { ViewerSession } from "./viewer/ViewerSession";

const log = Logger.getLogger("app");

const TOOLBAR: { command: ViewerCommand; label: string; title: string }[] = [
  { command: "previous-document", label: "‹", title: "Previous (←)" },
  { command: "next-document", label: "›", title: "Next (→)" },
  { command: "rotate-ccw", label: "⟲", title: "Rotate left (Shift+R)" },
  { command: "rotate-cw", label: "⟳", title: "Rotate right (R)" },
  { command: "flip-horizontal", label: "⇋", title: "Flip horizontal (H)" },
  { command: "flip-vertical", label: "⇵", title: "Flip vertical (V)" },
  { command: "zoom-out", label: "−", title: "Zoom out (-)" },
  { command: "zoom-in", label: "+", title: "Zoom in (+)" },
  { command: "zoom-reset", label: "1:1", title: "Actual size (1)" },
  { command: "toggle-fit", label: "Fit", title: "Toggle fit (F)" },
  { command: "toggle-navigation-panel", label: "Files", title: "Navigation panel (N)" },
  { command: "toggle-metadata-panel", label: "Info", title: "Metadata panel (I)" },
];

export interface AppProps {
  session: ViewerSession;
  initialDirectory?: string | null;
}

function reportOutcome(outcome: CommandOutcome): void {
  if (outcome.kind === "pending") {
    outcome.result.catch((error: unknown) => {
      log.error(`navigation failed: ${describeError(error)}`);
    });
  }
}

export default function App({ session, initialDirectory = null }: AppProps) {
  const subscribe = useCallback((listener: () => void) => session.subscribe(listener), [session]);
  const getSnapshot = useCallback(() => session.getSnapshot(), [session]);
  const snapshot = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
  const [reconciler] = useState(() => new InputReconciler(session));
  const [directory, setDirectory] = useState(initialDirectory ?? "");
  const viewerRef = useRef<HTMLElement | null>(null);

  useEffect(() => {
    let mounted = true;
    session
      .loadSettings()
      .then((settings) => {
        const start = initialDirectory ?? settings.defaultDirectory;
        if (!mounted || !start) {
          return;
        }
        setDirectory(start);
        return session.openDirectory(start);
      })
      .catch((error: unknown) => {
        log.error(`startup failed: ${describeError(error)}`);
      });
    return () => {
      mounted = false;
    };
  }, [session, initialDirectory]);

  useEffect(() => {
    const element = viewerRef.current;
    if (!element) {
      return;
    }
    const binding = new DomInputBinding(element, reconciler, {
      pointerTarget: window,
      keyTarget: window,
      resizeTarget: typeof ResizeObserver === "undefined" ? window : undefined,
    });
    let observer: ResizeObserver | null = null;
    if (typeof ResizeObserver !== "undefined") {
      observer = new ResizeObserver(() => binding.refreshSize());
      observer.observe(element);
    }
    return () => {
      observer?.disconnect();
      binding.dispose();
    };
  }, [reconciler]);

  const run = (command: ViewerCommand) => {
    reportOutcome(reconciler.handleCommand(command));
  };

  const handleOpen = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const target = directory.trim();
    if (!target) {
      return;
    }
    session.openDirectory(target).catch((error: unknown) => {
      log.error(`cannot open ${target}: ${describeError(error)}`);
    });
  };

  const handleSelect = (path: string) => {
    session.openPath(path).catch((error: unknown) => {
      log.error(`cannot open ${path}: ${describeError(error)}`);
    });
  };

  const surface = snapshot.activePath ? session.surface() : null;
  const origin = session.toScreen({ x: 0, y: 0 });
  const metadata = snapshot.panels.metadata ? session.metadata() : null;

  return (
    <div className="app">
      <header className="toolbar">
        <form className="folder-form" onSubmit={handleOpen}>
          <input
            type="text"
            value={directory}
            placeholder="Folder path"
            onChange={(event) => setDirectory(event.target.value)}
          />
          <button type="submit">Open</button>
        </form>
        <div className="toolbar-buttons">
          {TOOLBAR.map((item) => (
            <button key={item.command} type="button" title={item.title} onClick={() => run(item.command)}>
              {item.label}
            </button>
          ))}
        </div>
      </header>
      <div className="workspace">
        {snapshot.panels.navigation ? (
          <aside className="sidebar">
            <ul className="file-list">
              {session.navigationEntries().map((path) => (
                <li
                  key={path}
                  className={`file-item ${path === snapshot.activePath ? "active" : ""}`}
                  onClick={() => handleSelect(path)}
                >
                  {fileNameOf(path)}
                </li>
              ))}
            </ul>
          </aside>
        ) : null}
        <main className={`viewer tool-${snapshot.toolMode}`} ref={viewerRef} tabIndex={0}>
          {surface && origin ? (
            <SurfaceView surface={surface} origin={origin} zoom={snapshot.viewport.zoomFactor} />
          ) : null}
          {!snapshot.activePath && !snapshot.loading ? (
            <div className="viewer-placeholder">Open a folder to start viewing.</div>
          ) : null}
          {snapshot.loading ? <div className="viewer-placeholder">Loading...</div> : null}
        </main>
        {metadata ? (
          <aside className="metadata-panel">
            <dl>
              {metadataRows(metadata).map((row) => (
                <React.Fragment key={row.label}>
                  <dt>{row.label}</dt>
                  <dd>{row.value}</dd>
                </React.Fragment>
              ))}
            </dl>
          </aside>
        ) : null}
      </div>
      <footer className="status-bar">
        <span className="status-zoom">{snapshot.status.zoomDisplay}</span>
        <span className="status-position">{snapshot.status.positionLabel}</span>
        <span className="status-dimensions">{snapshot.status.dimensions}</span>
        {snapshot.error ? <span className="error">{snapshot.error}</span> : null}
      </footer>
    </div>
  );
}

interface SurfaceViewProps {
  surface: RenderableSurface;
  origin: { x: number; y: number };
  zoom: number;
}

function SurfaceView({ surface, origin, zoom }: SurfaceViewProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const { width, height } = surface.intrinsicSize;
  const [a, b, c, d, e, f] = surface.matrix;
  const style: React.CSSProperties = {
    width,
    height,
    transformOrigin: "0 0",
    transform: `translate(${origin.x}px, ${origin.y}px) scale(${zoom}) matrix(${a}, ${b}, ${c}, ${d}, ${e}, ${f})`,
  };

  useEffect(() => {
    const canvas = canvasRef.current;
    const content = surface.content;
    if (canvas && isDrawable(content)) {
      canvas.getContext("2d")?.drawImage(content, 0, 0);
    }
  }, [surface.content]);

  if (surface.kind === "vector" && typeof surface.content === "string") {
    const src = `data:image/svg+xml;charset=utf-8,${encodeURIComponent(surface.content)}`;
    return <img className="surface" style={style} src={src} alt="" draggable={false} />;
  }
  return <canvas className={`surface surface-${surface.kind}`} style={style} ref={canvasRef} width={width} height={height} />;
}

function isDrawable(content: unknown): content is ImageBitmap | HTMLCanvasElement {
  return (
    (typeof ImageBitmap !== "undefined" && content instanceof ImageBitmap) ||
    (typeof HTMLCanvasElement !== "undefined" && content instanceof HTMLCanvasElement)
  );
}
