import { documentKindFromPath, parentDirectory } from "../document/Document";

export type NavigationResult =
  | { status: "moved"; path: string; index: number }
  | { status: "at-boundary"; index: number | null };

export interface PositionLabel {
  current: number;
  total: number;
}

export interface NavigationOptions {
  wrap?: boolean;
}

/** Keeps supported documents only, in a stable alphabetical order. */
export function supportedEntries(paths: readonly string[]): string[] {
  return paths
    .filter((path) => documentKindFromPath(path) !== null)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export class NavigationIndex {
  private entries: string[] = [];
  private cursor: number | null = null;
  private folder: string | null = null;
  private wrap: boolean;

  constructor(options: NavigationOptions = {}) {
    this.wrap = options.wrap ?? false;
  }

  get length(): number {
    return this.entries.length;
  }

  get directory(): string | null {
    return this.folder;
  }

  get index(): number | null {
    return this.cursor;
  }

  get current(): string | null {
    return this.cursor === null ? null : this.entries[this.cursor] ?? null;
  }

  paths(): readonly string[] {
    return this.entries;
  }

  rebuild(paths: readonly string[], activePath: string | null, directory?: string): void {
    this.entries = supportedEntries(paths);
    this.folder = directory ?? (activePath ? parentDirectory(activePath) : null);
    const position = activePath === null ? -1 : this.entries.indexOf(activePath);
    if (position >= 0) {
      this.cursor = position;
    } else {
      this.cursor = this.entries.length > 0 && activePath === null ? 0 : null;
    }
  }

  /** Points the cursor at `path` if it is part of the index. */
  select(path: string): boolean {
    const position = this.entries.indexOf(path);
    if (position < 0) {
      return false;
    }
    this.cursor = position;
    return true;
  }

  next(): NavigationResult {
    return this.commit(this.step(1));
  }

  previous(): NavigationResult {
    return this.commit(this.step(-1));
  }

  positionLabel(): PositionLabel {
    return {
      current: this.cursor === null ? 0 : this.cursor + 1,
      total: this.entries.length,
    };
  }

  private step(direction: 1 | -1): NavigationResult {
    const total = this.entries.length;
    if (total === 0) {
      return { status: "at-boundary", index: null };
    }
    if (this.cursor === null) {
      const start = direction === 1 ? 0 : total - 1;
      return { status: "moved", path: this.entries[start], index: start };
    }
    let target = this.cursor + direction;
    if (target < 0 || target >= total) {
      if (!this.wrap || total === 1) {
        return { status: "at-boundary", index: this.cursor };
      }
      target = (target + total) % total;
    }
    return { status: "moved", path: this.entries[target], index: target };
  }

  private commit(result: NavigationResult): NavigationResult {
    if (result.status === "moved") {
      this.cursor = result.index;
    }
    return result;
  }
}

export function formatPositionLabel(label: PositionLabel): string {
  return label.total === 0 ? "" : `${label.current} / ${label.total}`;
}
