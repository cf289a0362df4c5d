import type { LogLevel } from "./types.js";
import { AsyncLocalStorage } from "node:async_hooks";

export type LogCallback = (level: LogLevel, message: string, url?: string) => void | Promise<void>;

const logCallbackStorage = new AsyncLocalStorage<LogCallback | null>();
let fallbackLogCallback: LogCallback | null = null;

export function setLogCallback(callback: LogCallback | null): void {
  fallbackLogCallback = callback;
}

export function runWithLogCallback<T>(callback: LogCallback | null, fn: () => T): T {
  return logCallbackStorage.run(callback, fn);
}

function getLogCallback(): LogCallback | null {
  const scoped = logCallbackStorage.getStore();
  return scoped === undefined ? fallbackLogCallback : scoped;
}

function emit(level: LogLevel, message: string, url?: string): void {
  const callback = getLogCallback();
  if (!callback) {
    return;
  }
  try {
    Promise.resolve(callback(level, message, url)).catch((error: unknown) => {
      console.error("[error]", `log callback failed: ${String(error)}`);
    });
  } catch (error) {
    console.error("[error]", `log callback failed: ${String(error)}`);
  }
}

export const log = {
  debug: (message: string, url?: string) => {
    if (getLogCallback()) {
      emit("debug", message, url);
    } else if (process.env.SCRIPT_SCOUT_DEBUG === "1") {
      console.log("[debug]", message);
    }
  },
  info: (message: string, url?: string) => {
    if (getLogCallback()) {
      emit("info", message, url);
    } else {
      console.log("[info]", message);
    }
  },
  warn: (message: string, url?: string) => {
    if (getLogCallback()) {
      emit("warn", message, url);
    } else {
      console.warn("[warn]", message);
    }
  },
  error: (message: string, url?: string) => {
    if (getLogCallback()) {
      emit("error", message, url);
    } else {
      console.error("[error]", message);
    }
  },
};
