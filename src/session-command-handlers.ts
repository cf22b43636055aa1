/**
 * Session Command Handlers - window and pointer-device commands.
 *
 * Each handler resolves its session at execution time and performs one
 * driver action. Driver errors are not caught here.
 */

import { SessionCommandHandler, type HandlerContext } from "./command-handler.js";
import { HandlerConstructionFailedError } from "./errors.js";
import type { BodyParameters, LocatorParameters, MouseTarget } from "./types.js";
import {
  optionalIntegerParameter,
  optionalStringParameter,
  requireIntegerParameter,
} from "./validation.js";

/** Button code of the primary mouse button. */
export const PRIMARY_MOUSE_BUTTON = 0;

/** Pointer actions act at the last coordinates the driver recorded. */
const LAST_KNOWN_POSITION: MouseTarget = null;

// =============================================================================
// WINDOWS
// =============================================================================

/**
 * Returns every window handle of the session's driver, in driver order.
 */
export class GetWindowHandlesHandler extends SessionCommandHandler {
  describe(): string {
    return "[get all window handles]";
  }

  protected async run(): Promise<string[]> {
    const session = this.getSession();
    const handles = await session.driver.getWindowHandles();
    return Array.from(handles);
  }
}

export class GetCurrentWindowHandleHandler extends SessionCommandHandler {
  describe(): string {
    return "[get current window handle]";
  }

  protected async run(): Promise<string> {
    return this.getSession().driver.getCurrentWindowHandle();
  }
}

// =============================================================================
// POINTER DEVICE
// =============================================================================

/**
 * Clicks at the last known coordinates. `button` 0 is a primary click,
 * anything else a context click.
 */
export class MouseClickHandler extends SessionCommandHandler {
  private readonly primaryButton: boolean;

  constructor(context: HandlerContext, locator: LocatorParameters, body: BodyParameters) {
    super(context, locator, body);
    this.primaryButton = requireIntegerParameter(body, "button") === PRIMARY_MOUSE_BUTTON;
  }

  describe(): string {
    return "[click mouse]";
  }

  protected async run(): Promise<null> {
    const mouse = this.getMouse(this.getSession());
    if (this.primaryButton) {
      await mouse.click(LAST_KNOWN_POSITION);
    } else {
      await mouse.contextClick(LAST_KNOWN_POSITION);
    }
    return null;
  }
}

export class MouseDoubleClickHandler extends SessionCommandHandler {
  describe(): string {
    return "[double-click mouse]";
  }

  protected async run(): Promise<null> {
    await this.getMouse(this.getSession()).doubleClick(LAST_KNOWN_POSITION);
    return null;
  }
}

export class MouseDownHandler extends SessionCommandHandler {
  describe(): string {
    return "[mouse button down]";
  }

  protected async run(): Promise<null> {
    await this.getMouse(this.getSession()).mouseDown(LAST_KNOWN_POSITION);
    return null;
  }
}

export class MouseUpHandler extends SessionCommandHandler {
  describe(): string {
    return "[mouse button up]";
  }

  protected async run(): Promise<null> {
    await this.getMouse(this.getSession()).mouseUp(LAST_KNOWN_POSITION);
    return null;
  }
}

/**
 * Moves to an element, optionally offset from its corner, or by an offset
 * from the current position when no element is given.
 */
export class MouseMoveToHandler extends SessionCommandHandler {
  private readonly element: string | undefined;
  private readonly xOffset: number | undefined;
  private readonly yOffset: number | undefined;

  constructor(context: HandlerContext, locator: LocatorParameters, body: BodyParameters) {
    super(context, locator, body);
    this.element = optionalStringParameter(body, "element");
    this.xOffset = optionalIntegerParameter(body, "xoffset");
    this.yOffset = optionalIntegerParameter(body, "yoffset");

    if ((this.xOffset === undefined) !== (this.yOffset === undefined)) {
      throw new HandlerConstructionFailedError(
        this.xOffset === undefined ? "xoffset" : "yoffset",
        "xoffset and yoffset must be given together"
      );
    }
    if (this.element === undefined && this.xOffset === undefined) {
      throw new HandlerConstructionFailedError("element", "Required when no offsets are given");
    }
  }

  describe(): string {
    return "[move mouse]";
  }

  protected async run(): Promise<null> {
    const mouse = this.getMouse(this.getSession());
    await mouse.mouseMove(this.element ?? LAST_KNOWN_POSITION, this.xOffset, this.yOffset);
    return null;
  }
}
