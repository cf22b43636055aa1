/**
 * In-process fake drivers shared by the unit tests.
 */

import path from "path";
import { fileURLToPath } from "url";
import type {
  AutomationDriver,
  Capabilities,
  DriverModule,
  HasInputDevices,
  Mouse,
  MouseTarget,
} from "./types.js";

export const FIXTURE_DRIVER_DIR = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "test-fixtures",
  "driver-libraries"
);

export interface MouseCall {
  action: "click" | "contextClick" | "doubleClick" | "mouseDown" | "mouseUp" | "mouseMove";
  target: MouseTarget;
  xOffset?: number;
  yOffset?: number;
}

export class FakeMouse implements Mouse {
  readonly calls: MouseCall[] = [];

  click(target: MouseTarget): void {
    this.calls.push({ action: "click", target });
  }

  contextClick(target: MouseTarget): void {
    this.calls.push({ action: "contextClick", target });
  }

  doubleClick(target: MouseTarget): void {
    this.calls.push({ action: "doubleClick", target });
  }

  mouseDown(target: MouseTarget): void {
    this.calls.push({ action: "mouseDown", target });
  }

  mouseUp(target: MouseTarget): void {
    this.calls.push({ action: "mouseUp", target });
  }

  mouseMove(target: MouseTarget, xOffset?: number, yOffset?: number): void {
    this.calls.push({ action: "mouseMove", target, xOffset, yOffset });
  }
}

/**
 * Fake browser driver. Window handles come from the `windowHandles`
 * capability when it is a string array.
 */
export class FakeDriver implements AutomationDriver, HasInputDevices {
  readonly mouse = new FakeMouse();
  readonly windowHandles: string[];
  quitCount = 0;

  constructor(readonly capabilities: Capabilities) {
    const handles = capabilities.windowHandles;
    this.windowHandles =
      Array.isArray(handles) && handles.every((h): h is string => typeof h === "string")
        ? [...handles]
        : ["main-window"];
  }

  getWindowHandles(): readonly string[] {
    return this.windowHandles;
  }

  getCurrentWindowHandle(): string {
    return this.windowHandles[0] ?? "";
  }

  quit(): void {
    this.quitCount++;
  }
}

/** Driver without pointer control. */
export class PointerlessDriver implements AutomationDriver {
  constructor(readonly capabilities: Capabilities) {}

  getWindowHandles(): string[] {
    return ["only-window"];
  }

  getCurrentWindowHandle(): string {
    return "only-window";
  }

  quit(): void {}
}

/** Driver whose constructor always throws. */
export class BrokenDriver implements AutomationDriver {
  constructor(_capabilities: Capabilities) {
    throw new Error("browser binary not found");
  }

  getWindowHandles(): string[] {
    return [];
  }

  getCurrentWindowHandle(): string {
    return "";
  }

  quit(): void {}
}

/** Driver whose actions fail. */
export class FailingDriver implements AutomationDriver {
  constructor(readonly capabilities: Capabilities) {}

  getWindowHandles(): string[] {
    throw new Error("window enumeration failed");
  }

  getCurrentWindowHandle(): string {
    throw new Error("no current window");
  }

  quit(): Promise<void> {
    return Promise.reject(new Error("quit failed"));
  }
}

/**
 * Driver whose window enumeration waits for `releaseAll()`; records how many
 * calls overlap, and whether quit ran during one.
 */
export class SlowDriver implements AutomationDriver {
  static active = 0;
  static maxActive = 0;
  static quitCount = 0;
  static quitDuringAction = false;
  private static waiting: Array<() => void> = [];

  constructor(readonly capabilities: Capabilities) {}

  static reset(): void {
    SlowDriver.active = 0;
    SlowDriver.maxActive = 0;
    SlowDriver.quitCount = 0;
    SlowDriver.quitDuringAction = false;
    SlowDriver.waiting = [];
  }

  /** Let every pending call finish. */
  static releaseAll(): void {
    const pending = SlowDriver.waiting;
    SlowDriver.waiting = [];
    for (const resolve of pending) resolve();
  }

  static get pendingCount(): number {
    return SlowDriver.waiting.length;
  }

  async getWindowHandles(): Promise<string[]> {
    SlowDriver.active++;
    SlowDriver.maxActive = Math.max(SlowDriver.maxActive, SlowDriver.active);
    await new Promise<void>((resolve) => SlowDriver.waiting.push(resolve));
    SlowDriver.active--;
    return ["slow-window"];
  }

  getCurrentWindowHandle(): string {
    return "slow-window";
  }

  quit(): void {
    SlowDriver.quitCount++;
    if (SlowDriver.active > 0) {
      SlowDriver.quitDuringAction = true;
    }
  }
}

/** Not a driver: lacks every AutomationDriver method. */
export class NotADriver {
  navigate(): void {}
}

/** Module namespace preloaded into registries under the name "FakeDrivers". */
export const FAKE_DRIVER_MODULE: DriverModule = {
  FakeDriver,
  PointerlessDriver,
  BrokenDriver,
  FailingDriver,
  SlowDriver,
  NotADriver,
  notAClass: 42,
};

/** Let pending promise callbacks run. */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
