/**
 * @trellis-ui/core
 *
 * Event routing and focus management for a retained-mode widget toolkit.
 * Widgets are reached through the `Node` interface and the platform through
 * `Runner`; everything else lives here.
 */

// =============================================================================
// Errors and logging
// =============================================================================

export { UiError, type UiErrorCode, describeThrown } from "./errors.js";
export {
  type LogLevel,
  type LogRecordLevel,
  type LogSink,
  type Logger,
  LOG_LEVELS,
  createConsoleLogger,
  createLogger,
  debugAssert,
  isLogLevel,
} from "./debug/logger.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_EVENT_CONFIG,
  type EventConfig,
  type EventConfigInput,
  type MousePan,
  isPanEnabledWith,
  resolveEventConfig,
} from "./config/eventConfig.js";
export {
  type ParseShortcutResult,
  type ParsedShortcut,
  type ShortcutParseError,
  type ShortcutParseErrorCode,
  type ShortcutTable,
  Shortcuts,
  defaultShortcuts,
  describeShortcut,
  parseShortcut,
  readShortcutTable,
} from "./config/shortcuts.js";

// =============================================================================
// Ids
// =============================================================================

export { Id, type WindowId, sameId } from "./id/id.js";

// =============================================================================
// Event model
// =============================================================================

export * from "./event/types.js";
export {
  COMMANDS,
  type Command,
  type Direction,
  commandDirection,
  isCommand,
  suitableForSelFocus,
} from "./event/command.js";
export {
  type Event,
  type EventKind,
  type Press,
  type PressSource,
  commandEvent,
  describeEvent,
  isPrimarySource,
  isSecondarySource,
  mouseSource,
  passWhenDisabled,
  sourceRepetitions,
  touchSource,
} from "./event/event.js";
export {
  Activate,
  DecrementStep,
  Erased,
  IncrementStep,
  KineticScrollEnd,
  MessageStack,
  type MessageType,
  ReplaceSelectedText,
  Select,
  SetIndex,
  SetScrollOffset,
  SetValueF64,
  SetValueText,
} from "./event/messages.js";
export { TimerHandle, TimerQueue, type TimerEntry, type TimerRequestResult } from "./event/timers.js";

// =============================================================================
// Tree and platform collaborators
// =============================================================================

export {
  type AppData,
  type NavSearchCx,
  type Node,
  type PopupDescriptor,
  type Runner,
  type Waker,
  type WindowSpec,
  configureTree,
  findNode,
  findPath,
  navNext,
  probeTree,
  updateTree,
} from "./event/node.js";

// =============================================================================
// Press, focus and popups
// =============================================================================

export { GrabBuilder, grab } from "./event/press/press.js";
export { FAKE_MOUSE_BUTTON, type MouseGrab } from "./event/press/mouse.js";
export { MAX_TOUCHES, type TouchGrab, strongerMode } from "./event/press/touch.js";
export {
  MAX_PANS,
  MAX_PAN_POINTERS,
  type PanTransform,
  VelocitySampler,
  panTransform,
} from "./event/press/pan.js";
export {
  FocusState,
  type PendingNavFocus,
  type PendingSelFocus,
} from "./event/focus.js";
export { AccessLayers } from "./event/accessLayers.js";
export { PopupStack, type PopupState } from "./event/popups.js";
export { AsyncQueue, type Spawner, microtaskSpawner } from "./event/async.js";

// =============================================================================
// Dispatch
// =============================================================================

export { ConfigCx } from "./event/configCx.js";
export { EventState, type EventStateOptions } from "./event/eventState.js";
export { EventCx, type EventCxOptions } from "./event/eventCx.js";
export { EventWindow, type PlatformEvent, type TouchPhase } from "./event/window.js";
export {
  type AccessAction,
  type AccessActionData,
  type AccessActionRequest,
  type AccessEffect,
  resolveAccessAction,
} from "./event/accessibility.js";
