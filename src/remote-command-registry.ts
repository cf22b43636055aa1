/**
 * Command table of the remote automation server.
 */

import { CommandRegistry } from "./command-registry.js";
import {
  GetSessionCapabilitiesHandler,
  GetSessionListHandler,
  NewSessionHandler,
  QuitHandler,
} from "./server-command-handlers.js";
import {
  GetCurrentWindowHandleHandler,
  GetWindowHandlesHandler,
  MouseClickHandler,
  MouseDoubleClickHandler,
  MouseDownHandler,
  MouseMoveToHandler,
  MouseUpHandler,
} from "./session-command-handlers.js";
import { DriverCommand } from "./types.js";

export class RemoteCommandRegistry extends CommandRegistry {
  protected registerHandlers(): void {
    // Session lifecycle
    this.registerHandler(DriverCommand.NewSession, NewSessionHandler);
    this.registerHandler(DriverCommand.GetSessionList, GetSessionListHandler);
    this.registerHandler(DriverCommand.GetSessionCapabilities, GetSessionCapabilitiesHandler);
    this.registerHandler(DriverCommand.Quit, QuitHandler);

    // Windows
    this.registerHandler(DriverCommand.GetWindowHandles, GetWindowHandlesHandler);
    this.registerHandler(DriverCommand.GetCurrentWindowHandle, GetCurrentWindowHandleHandler);

    // Pointer device
    this.registerHandler(DriverCommand.MouseClick, MouseClickHandler);
    this.registerHandler(DriverCommand.MouseDoubleClick, MouseDoubleClickHandler);
    this.registerHandler(DriverCommand.MouseDown, MouseDownHandler);
    this.registerHandler(DriverCommand.MouseUp, MouseUpHandler);
    this.registerHandler(DriverCommand.MouseMoveTo, MouseMoveToHandler);
  }
}
