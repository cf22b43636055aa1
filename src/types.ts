/**
 * Protocol and driver types for the remote automation core.
 * The command table IS the protocol surface.
 */

// ============================================================================
// COMMANDS
// ============================================================================

/**
 * Closed, versioned set of protocol commands known to the server.
 * Not every command has a handler; unmapped ones resolve to the
 * unsupported-command handler.
 */
export const DriverCommand = {
  // Session lifecycle
  NewSession: "new_session",
  GetSessionList: "get_session_list",
  GetSessionCapabilities: "get_session_capabilities",
  Quit: "quit",
  // Windows
  GetCurrentWindowHandle: "get_current_window_handle",
  GetWindowHandles: "get_window_handles",
  SwitchToWindow: "switch_to_window",
  Close: "close",
  // Navigation
  Get: "get",
  GetCurrentUrl: "get_current_url",
  GetTitle: "get_title",
  GetPageSource: "get_page_source",
  Screenshot: "take_screenshot",
  // Elements
  FindElement: "find_element",
  FindElements: "find_elements",
  ExecuteScript: "execute_script",
  // Pointer device
  MouseClick: "mouse_click",
  MouseDoubleClick: "mouse_double_click",
  MouseDown: "mouse_down",
  MouseUp: "mouse_up",
  MouseMoveTo: "mouse_move_to",
} as const;

export type DriverCommandId = (typeof DriverCommand)[keyof typeof DriverCommand];

/** Protocol version of the command table above. */
export const PROTOCOL_VERSION = "1.0.0";

/** Locator parameter key that carries the session id in per-session commands. */
export const SESSION_ID_PARAMETER = "sessionId";

/** Parameters matched from the request path (session id, element id, ...). */
export type LocatorParameters = Readonly<Record<string, string>>;

/** Parameters decoded from the request payload. */
export type BodyParameters = Readonly<Record<string, unknown>>;

// ============================================================================
// CAPABILITIES
// ============================================================================

/** Automation features a client requests when creating a session. */
export type Capabilities = Readonly<Record<string, unknown>>;

// ============================================================================
// DRIVER CAPABILITY
// ============================================================================

export type Awaitable<T> = T | Promise<T>;

/** Where a pointer action happens. `null` means the last known coordinates. */
export type MouseTarget = string | null;

/**
 * Pointer-device actions exposed by drivers that support input devices.
 */
export interface Mouse {
  click(target: MouseTarget): Awaitable<void>;
  contextClick(target: MouseTarget): Awaitable<void>;
  doubleClick(target: MouseTarget): Awaitable<void>;
  mouseDown(target: MouseTarget): Awaitable<void>;
  mouseUp(target: MouseTarget): Awaitable<void>;
  mouseMove(target: MouseTarget, xOffset?: number, yOffset?: number): Awaitable<void>;
}

/**
 * The session-drivable automation interface every registered driver type
 * must implement.
 */
export interface AutomationDriver {
  /** Ordered window handles, as the backend reports them. */
  getWindowHandles(): Awaitable<readonly string[]>;
  getCurrentWindowHandle(): Awaitable<string>;
  quit(): Awaitable<void>;
}

/** Drivers that also expose pointer control. */
export interface HasInputDevices {
  readonly mouse: Mouse;
}

/**
 * Methods a driver type's prototype must carry to be registered.
 * Kept in sync with {@link AutomationDriver}.
 */
export const REQUIRED_DRIVER_METHODS = [
  "getWindowHandles",
  "getCurrentWindowHandle",
  "quit",
] as const satisfies ReadonlyArray<keyof AutomationDriver>;

export type DriverConstructor = new (capabilities: Capabilities) => AutomationDriver;

/** Namespace object of a driver module (what `import()` resolves to). */
export type DriverModule = Readonly<Record<string, unknown>>;

// ============================================================================
// SESSION INFO
// ============================================================================

export interface SessionSummary {
  sessionId: string;
  capabilities: Capabilities;
  createdAt: string;
}
