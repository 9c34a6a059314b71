/**
 * @cellframe/core
 *
 * Runtime-agnostic core: styled buffers, compositing, borders, layout, focus,
 * key dispatch, the render walker and the application root.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports); the
 * terminal host lives in @cellframe/node.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  CellframeError,
  type CellframeErrorCode,
  contractViolation,
  describeThrown,
  invalidProps,
  requireNonNegativeInt,
  requirePositiveInt,
} from "./errors.js";

// =============================================================================
// Styling
// =============================================================================

export { type Rgb24, type TextStyle, mergeTextStyle, rgb, rgbB, rgbBlend, rgbG, rgbR } from "./widgets/style.js";
export {
  CLEAR_SCREEN,
  CURSOR_HOME,
  ENTER_ALT_SCREEN,
  ERASE_TO_LINE_END,
  HIDE_CURSOR,
  LEAVE_ALT_SCREEN,
  SGR_RESET,
  SHOW_CURSOR,
  applyPersistentBackground,
  applyPersistentSgr,
  colorize,
  moveCursor,
  styleToSgr,
} from "./renderer/ansi.js";
export { defaultTheme } from "./theme/defaultTheme.js";
export {
  type Theme,
  type ThemeColorName,
  type ThemeColors,
  type ThemeOverrides,
  createTheme,
  resolveColor,
} from "./theme/theme.js";

// =============================================================================
// Buffers and compositing
// =============================================================================

export { padToWidth, stripAnsi, visibleWidth } from "./buffer/ansiLine.js";
export {
  EMPTY_BUFFER,
  type StyledBuffer,
  appendHorizontally,
  appendVertically,
  blankBuffer,
  createBuffer,
  isEmptyBuffer,
  textBuffer,
} from "./buffer/styledBuffer.js";
export { composite, dimBuffer, sliceVisible } from "./buffer/compositor.js";
export { measureTextCells } from "./layout/textMeasure.js";

// =============================================================================
// Borders
// =============================================================================

export {
  type BorderFamily,
  type BorderStyle,
  type BorderStyleId,
  FOCUS_INDICATOR,
  getBorderStyle,
  isBorderStyleId,
} from "./renderer/borderStyle.js";
export { type ContainerFrameInput, containerInnerWidth, renderContainer } from "./renderer/borderRenderer.js";

// =============================================================================
// Layout
// =============================================================================

export {
  type Alignment,
  type EdgeInsets,
  type FrameConstraint,
  type HorizontalAlignment,
  type Size,
  type VerticalAlignment,
  alignment,
  frameConstraint,
  insets,
} from "./layout/types.js";
export { padBuffer } from "./layout/padding.js";
export { type FrameSizing, alignBuffer, alignedOrigin, frameExtent, resolveFrameSize } from "./layout/frame.js";
export { justifyGaps, justifyLine } from "./layout/justify.js";
export { type StackEntry, layoutHorizontal, layoutVertical } from "./layout/stack.js";

// =============================================================================
// Keys and focus
// =============================================================================

export type {
  Key,
  KeyEvent,
  KeyHandler,
  KeyModifiers,
  KeyParseError,
  KeyPattern,
  NamedKey,
  ParseKeyResult,
} from "./keybindings/types.js";
export { keyPatternToString, matchesKeyPattern, parseKeyPattern, requireKeyPattern } from "./keybindings/parser.js";
export { charKeyEvent, isPlainNamedKey, namedKeyEvent, pasteKeyEvent } from "./keybindings/keyEvent.js";
export { KeyEventDispatcher } from "./keybindings/dispatcher.js";
export {
  type FocusManagerOptions,
  type FocusableRegistration,
  FocusManager,
  type SelectionPolicy,
} from "./runtime/focus.js";

// =============================================================================
// Views and rendering
// =============================================================================

export {
  type CompositeView,
  type PrimitiveView,
  type View,
  composite as compositeView,
  isView,
  primitive,
} from "./runtime/view.js";
export { measureView, renderView } from "./runtime/walker.js";
export { DEFAULT_SECTION_ID, RenderContext, type RenderContextInit } from "./runtime/renderContext.js";
export {
  Environment,
  EnvironmentKey,
  borderStyleKey,
  createEnvironmentKey,
  foregroundStyleKey,
  themeKey,
} from "./runtime/environment.js";
export { ROOT_IDENTITY, type ViewIdentity } from "./runtime/identity.js";
export { type StateCell, StateStore, type TrackResult } from "./runtime/stateStore.js";
export { ChildListBuilder, children } from "./widgets/children.js";
export { ui } from "./widgets/ui.js";
export type { ButtonProps, StatusBarItem, StatusBarOptions } from "./widgets/controls.js";
export type { BorderProps, ContainerProps, PanelProps } from "./widgets/container.js";
export type { AlertAction, AlertProps, ModalProps } from "./widgets/modal.js";
export type { FrameDimension, FrameProps, KeyPressAction, OnChangeOptions } from "./widgets/modifiers.js";
export type { HStackOptions, VStackOptions, ZStackOptions } from "./widgets/stacks.js";

// =============================================================================
// Application
// =============================================================================

export { createApp } from "./app/createApp.js";
export { DEFAULT_CONFIG, resolveAppConfig } from "./app/config.js";
export { FrameDiffWriter, type FrameDiff } from "./app/frameDiff.js";
export { type DevWarningSink, type DevWarningTopic, createDevWarnings } from "./app/devWarnings.js";
export type {
  App,
  AppConfig,
  AppFrameMetrics,
  CreateAppOptions,
  ResolvedAppConfig,
  TerminalHost,
} from "./app/types.js";
