import { AsyncLocalStorage } from "async_hooks";
import type { PipelineStage } from "./types.js";

export interface TelemetryContextValue {
  stage: PipelineStage;
  source?: string;
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function runWithTelemetryContext<T>(value: TelemetryContextValue, fn: () => T): T {
  return storage.run(value, fn);
}

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { stage: "system" };
}
