import { toAppError, type AppError } from "../../domain/common/errors";
import type { Office } from "../../domain/office/types";
import type { OfficeFetcher } from "../../infrastructure/http/office-fetcher";
import { createLogger, type Logger } from "../../infrastructure/logging/logger";
import { dayKey, type DayTracker } from "../../infrastructure/tracker/day-tracker";
import { extractOffice } from "./extract";

export type OfficeState =
  | { status: "idle" }
  | { status: "loading" }
  | { status: "loaded"; office: Office }
  | { status: "failed"; reason: string; error: AppError };

export type OfficeStateListener = (state: OfficeState) => void;

export type OfficeLoaderDeps = {
  fetcher: OfficeFetcher;
  tracker?: DayTracker;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Fetch-then-extract with an observable state. Only one load is live at a
 * time: starting another (a retry) aborts the previous one, whose outcome is
 * then ignored. Once the office is extracted the load is finished and can no
 * longer be cancelled.
 */
export class OfficeLoader {
  private readonly deps: OfficeLoaderDeps;
  private readonly logger: Logger;
  private readonly listeners = new Set<OfficeStateListener>();
  private state: OfficeState = { status: "idle" };
  private inFlight?: AbortController;

  constructor(deps: OfficeLoaderDeps) {
    this.deps = deps;
    this.logger = (deps.logger ?? createLogger({ logLevel: "error" })).child("loader");
  }

  getState(): OfficeState {
    return this.state;
  }

  /** Returns the unsubscribe function. */
  subscribe(listener: OfficeStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async load(): Promise<OfficeState> {
    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;
    this.setState({ status: "loading" });
    this.logger.debug("Fetching office");

    try {
      const html = await this.deps.fetcher(controller.signal);
      if (controller.signal.aborted) return this.state;

      const office = extractOffice(html);
      this.inFlight = undefined;
      this.logger.info(`Extracted ${office.sections.length} sections from "${office.title}"`);
      this.setState({ status: "loaded", office });
      await this.markCompleted();
      return this.state;
    } catch (error) {
      if (controller.signal.aborted) return this.state;
      const appError = toAppError(error);
      this.logger.error(`Failed to load office: ${appError.message}`);
      this.setState({ status: "failed", reason: appError.message, error: appError });
    } finally {
      if (this.inFlight === controller) this.inFlight = undefined;
    }
    return this.state;
  }

  /** Aborts the live load, if any, and returns to idle. */
  cancel(): void {
    if (!this.inFlight) return;
    this.inFlight.abort();
    this.inFlight = undefined;
    this.setState({ status: "idle" });
  }

  private async markCompleted(): Promise<void> {
    const { tracker, now } = this.deps;
    if (!tracker) return;
    const key = dayKey(now ? now() : new Date());
    try {
      await tracker.markCompleted(key);
    } catch (error) {
      this.logger.warn(`Could not mark ${key} as prayed: ${toAppError(error).message}`);
    }
  }

  /** A throwing listener is logged and never changes the load's outcome. */
  private setState(next: OfficeState): void {
    this.state = next;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.error(`State listener failed on ${next.status}: ${toAppError(error).message}`);
      }
    }
  }
}
