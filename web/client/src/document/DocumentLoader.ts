import { DecodeError, describeError } from "../errors";
import { Logger } from "../logger";
import { isPositiveSize } from "../types";
import type { ViewerDocument } from "./Document";
import { intrinsicSize } from "./Document";

const log = Logger.getLogger("document-loader");

export interface DocumentDecoder {
  /** Resolves with the decoded document; should stop work once `signal` aborts. */
  decode(path: string, signal: AbortSignal): Promise<ViewerDocument>;
  /** Frees whatever backs a decoded document once it is discarded or replaced. */
  release?(document: ViewerDocument): void;
}

export type LoadResult =
  | { status: "loaded"; path: string; generation: number; document: ViewerDocument }
  | { status: "failed"; path: string; generation: number; error: DecodeError }
  | { status: "stale"; path: string; generation: number };

function validate(path: string, document: ViewerDocument): DecodeError | null {
  try {
    const size = intrinsicSize(document);
    return isPositiveSize(size)
      ? null
      : new DecodeError(path, `decoder reported size ${size.width}x${size.height}`);
  } catch (error) {
    return error instanceof DecodeError ? error : new DecodeError(path, describeError(error), { cause: error });
  }
}

/**
 * Issues decode requests tagged with a generation. Only the newest request can
 * produce a `loaded` or `failed` result; anything older resolves as `stale`.
 */
export class DocumentLoader {
  private decoder: DocumentDecoder;
  private generation = 0;
  private controller: AbortController | null = null;

  constructor(decoder: DocumentDecoder) {
    this.decoder = decoder;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  isPending(): boolean {
    return this.controller !== null;
  }

  async load(path: string): Promise<LoadResult> {
    this.generation += 1;
    const generation = this.generation;
    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;

    let outcome: { document: ViewerDocument } | { error: unknown };
    try {
      outcome = { document: await this.decoder.decode(path, controller.signal) };
    } catch (error) {
      outcome = { error };
    }

    if (generation !== this.generation) {
      log.debug(`discarding result for ${path}`, { generation, current: this.generation });
      if ("document" in outcome) {
        this.release(outcome.document);
      }
      return { status: "stale", path, generation };
    }
    this.controller = null;

    if ("error" in outcome) {
      const error =
        outcome.error instanceof DecodeError
          ? outcome.error
          : new DecodeError(path, describeError(outcome.error), { cause: outcome.error });
      log.warn(error.message);
      return { status: "failed", path, generation, error };
    }

    const invalid = validate(path, outcome.document);
    if (invalid) {
      log.warn(invalid.message);
      this.release(outcome.document);
      return { status: "failed", path, generation, error: invalid };
    }
    return { status: "loaded", path, generation, document: outcome.document };
  }

  release(document: ViewerDocument): void {
    try {
      this.decoder.release?.(document);
    } catch (error) {
      log.warn(`cannot release ${document.path}: ${describeError(error)}`);
    }
  }

  /** Invalidates any outstanding request. */
  cancel(): void {
    this.generation += 1;
    this.controller?.abort();
    this.controller = null;
  }
}
