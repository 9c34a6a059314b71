/**
 * packages/core/src/widgets/container.ts — container, panel and border views.
 *
 * Why: Views over renderContainer. The border style comes from the
 * environment unless the view names one; colors come from the theme.
 *
 * A container given a `sectionId` opens that focus section for its body and
 * footer, and (box family) shows the focus indicator while it is active.
 */

import { isEmptyBuffer } from "../buffer/styledBuffer.js";
import { invalidProps } from "../errors.js";
import { padBuffer } from "../layout/padding.js";
import { type EdgeInsets, insets as edgeInsets } from "../layout/types.js";
import { BORDER_WIDTH_OVERHEAD, renderContainer } from "../renderer/borderRenderer.js";
import { type BorderStyle, type BorderStyleId, getBorderStyle } from "../renderer/borderStyle.js";
import { borderStyleKey, themeKey } from "../runtime/environment.js";
import { type View, primitive } from "../runtime/view.js";
import { measureView, renderView } from "../runtime/walker.js";
import { type ThemeColorName, resolveColor } from "../theme/theme.js";
import type { Rgb24 } from "./style.js";

export type ContainerProps = Readonly<{
  title?: string;
  footer?: View;
  /** Overrides the environment's border style. */
  border?: BorderStyleId;
  borderColor?: ThemeColorName | Rgb24;
  titleColor?: ThemeColorName | Rgb24;
  /** Box family: fill the body with the container background. */
  fillBody?: boolean;
  showHeaderSeparator?: boolean;
  showFooterSeparator?: boolean;
  /** Space between the frame and the body/footer. Default one column on each side. */
  padding?: EdgeInsets;
  /** Focus section opened for the body and footer. */
  sectionId?: string;
}>;

const DEFAULT_PADDING: EdgeInsets = edgeInsets.symmetric(1, 0);

function frameRows(style: BorderStyle, props: ContainerProps): number {
  // Top and bottom edges; a block header adds its row and separator.
  if (style.family === "box" || props.title === undefined) return 2;
  return 3 + (props.showHeaderSeparator === false ? 0 : 1);
}

export function container(props: ContainerProps, content: View): View {
  if (props.sectionId !== undefined && props.sectionId.length === 0) {
    invalidProps("container sectionId must not be empty");
  }
  const pad = props.padding ?? DEFAULT_PADDING;

  return primitive("container", (ctx) => {
    const style = props.border !== undefined ? getBorderStyle(props.border) : ctx.get(borderStyleKey);
    const theme = ctx.get(themeKey);
    const sectionId = props.sectionId;
    const inner = sectionId === undefined ? ctx : ctx.withSection(sectionId);
    if (sectionId !== undefined) inner.registerSection();

    const bodyWidth = ctx.availableWidth - BORDER_WIDTH_OVERHEAD - pad.leading - pad.trailing;
    const footerView = props.footer;
    const footerCtx = inner.withBranch("footer").withSize(bodyWidth, ctx.availableHeight);
    const footerSize = footerView === undefined ? undefined : measureView(footerView, footerCtx);
    let footerRows = 0;
    if (footerSize !== undefined && footerSize.height > 0) {
      footerRows = footerSize.height + pad.top + pad.bottom + (props.showFooterSeparator === false ? 0 : 1);
    }

    const bodyHeight = ctx.availableHeight - frameRows(style, props) - footerRows - pad.top - pad.bottom;
    const body = padBuffer(renderView(content, inner.withSize(bodyWidth, bodyHeight)), pad);
    const footer =
      footerView === undefined ? undefined : padBuffer(renderView(footerView, footerCtx), pad);

    const showIndicator = sectionId !== undefined && style.family === "box" && ctx.focus.isSectionActive(sectionId);
    return renderContainer({
      body,
      title: props.title,
      footer: footer !== undefined && !isEmptyBuffer(footer) ? footer : undefined,
      border: style,
      borderColor: resolveColor(theme, props.borderColor ?? "border"),
      titleColor: resolveColor(theme, props.titleColor ?? "accent"),
      headerBackground: theme.colors.containerHeaderBackground,
      bodyBackground: theme.colors.containerBackground,
      fillBody: props.fillBody,
      showHeaderSeparator: props.showHeaderSeparator,
      showFooterSeparator: props.showFooterSeparator,
      focusIndicatorColor: showIndicator ? theme.colors.accent : undefined,
    });
  });
}

export type PanelProps = Omit<ContainerProps, "title">;

/** A titled container with a filled body. */
export function panel(title: string, content: View, props: PanelProps = {}): View {
  return container({ fillBody: true, ...props, title }, content);
}

export type BorderProps = Readonly<{
  style?: BorderStyleId;
  color?: ThemeColorName | Rgb24;
}>;

/** A plain frame with no padding, title or footer. */
export function border(content: View, props: BorderProps = {}): View {
  return container({ border: props.style, borderColor: props.color, padding: edgeInsets.zero }, content);
}
