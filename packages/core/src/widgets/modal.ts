/**
 * packages/core/src/widgets/modal.ts — Modal presentation and alerts.
 *
 * Why: A presented modal must take the keyboard without destroying what is
 * behind it. The base still renders (dimmed) but through an isolated context,
 * so its focusables and key handlers never reach the frame. Its own focus
 * section is left untouched and therefore keeps its elements and selection.
 *
 * Section lifecycle, per modal identity:
 *   first presented frame  push `modal:<id>` over the active section
 *   while presented        Escape calls onDismiss
 *   first hidden frame     pop `modal:<id>`, reactivating the covered section
 *
 * A modal that leaves the tree while presented is popped by the focus
 * manager at the end of the frame.
 */

import { composite, dimBuffer } from "../buffer/compositor.js";
import { alignBuffer, alignedOrigin } from "../layout/frame.js";
import { alignment } from "../layout/types.js";
import { isPlainNamedKey } from "../keybindings/keyEvent.js";
import { type View, primitive } from "../runtime/view.js";
import { renderView } from "../runtime/walker.js";
import { container } from "./container.js";
import { button, text } from "./controls.js";
import { hstack, vstack } from "./stacks.js";

export type ModalProps = Readonly<{
  isPresented: boolean;
  content: View;
  /** Called on Escape. Without it Escape passes through. */
  onDismiss?: () => void;
  /** Stable id for the modal's focus section. Defaults to the view identity. */
  id?: string;
}>;

export function modalSectionId(id: string): string {
  return `modal:${id}`;
}

/** `modal(props)(base)` presents `props.content` centred over `base`. */
export function modal(props: ModalProps): (base: View) => View {
  return (base) =>
    primitive("modal", (ctx) => {
      const sectionId = modalSectionId(props.id ?? ctx.identity);

      if (!props.isPresented) {
        if (!ctx.measuring) ctx.focus.popSection(sectionId);
        return renderView(base, ctx);
      }

      const behind = dimBuffer(renderView(base, ctx.isolated()));
      const opening = !ctx.measuring && !ctx.focus.isPushed(sectionId);

      const onDismiss = props.onDismiss;
      if (onDismiss !== undefined) {
        ctx.addKeyHandler((event) => {
          if (!isPlainNamedKey(event, "escape")) return false;
          onDismiss();
          return true;
        });
      }

      const modalCtx = ctx.withSection(sectionId).withBranch("modal");
      modalCtx.registerSection();
      const front = renderView(props.content, modalCtx);
      if (opening) ctx.focus.pushSection(sectionId);

      const size = {
        width: Math.max(behind.width, front.width),
        height: Math.max(behind.height, front.height),
      };
      const canvas = alignBuffer(behind, size.width, size.height, alignment.topLeading);
      const origin = alignedOrigin(alignment.center, size, front);
      return composite(canvas, front, origin.x, origin.y);
    });
}

export type AlertAction = Readonly<{
  label: string;
  onPress?: () => void;
  id?: string;
}>;

export type AlertProps = Readonly<{
  isPresented: boolean;
  title: string;
  message: string;
  actions: readonly AlertAction[];
  onDismiss?: () => void;
  id?: string;
}>;

/** A titled message with a row of action buttons, presented as a modal. */
export function alert(props: AlertProps): (base: View) => View {
  const idPrefix = props.id ?? "alert";
  const buttons = props.actions.map((action, i) =>
    button({ id: action.id ?? `${idPrefix}.action.${String(i)}`, label: action.label, onPress: action.onPress }),
  );
  const body =
    buttons.length === 0
      ? text(props.message)
      : vstack([text(props.message), hstack(buttons, { spacing: 2 })], { spacing: 1 });
  return modal({
    isPresented: props.isPresented,
    onDismiss: props.onDismiss,
    id: props.id,
    content: container({ title: props.title }, body),
  });
}
