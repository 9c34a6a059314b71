/**
 * packages/core/src/runtime/focus.ts — Focus sections and keyboard navigation.
 *
 * Why: Interactive views register themselves into named sections while the
 * tree renders. At most one section is active; arrow keys and Tab move the
 * selection inside it and Enter/Space activate the selected element.
 *
 * Focus rules:
 *   - Section order and element order are registration order
 *   - Re-registering an id updates it in place (order is kept)
 *   - Navigation wraps around and skips disabled elements
 *   - The first section registered while none is active becomes active
 *   - Each section keeps its selection while inactive, so a section suspended
 *     behind a modal resumes where it was
 *   - Unknown section or element ids are no-ops
 *
 * Frame bookkeeping: between beginFrame() and endFrame(), sections that
 * receive registrations drop elements that were not registered again.
 * Sections that receive none are dropped, unless a pushed section (a modal)
 * suspends them. A pushed section that receives none is popped. When the
 * active section is gone, the first section registered in the frame takes
 * over.
 */

import type { KeyEvent } from "../keybindings/types.js";

/** Focus traversal direction. */
export type FocusMove = "next" | "prev";

/**
 * Compute the next/prev focus ID based on current focus and focus list.
 * Wraps around at list boundaries (circular traversal).
 */
export function computeMovedFocusId(
  focusList: readonly string[],
  focusedId: string | null,
  move: FocusMove,
): string | null {
  const n = focusList.length;
  if (n === 0) return null;

  const first = focusList[0];
  const last = focusList[n - 1];
  if (first === undefined || last === undefined) return null;

  if (focusedId === null) return move === "next" ? first : last;

  const idx = focusList.indexOf(focusedId);
  if (idx < 0) return move === "next" ? first : last;

  const nextIdx = move === "next" ? (idx + 1) % n : (idx - 1 + n) % n;
  return focusList[nextIdx] ?? null;
}

export type FocusableRegistration = Readonly<{
  id: string;
  /** Default true. Disabled elements stay registered but are skipped. */
  enabled?: boolean;
  onActivate?: () => void;
}>;

/** What activating a section does to its remembered selection. */
export type SelectionPolicy = "preserve" | "reset";

export type FocusManagerOptions = Readonly<{
  /** Receives focus diagnostics (already formatted). */
  warn?: (message: string) => void;
  /** Called whenever the active section or a selection changes. */
  onChange?: () => void;
  /** Activate the first section registered while none is active. Default true. */
  autoActivate?: boolean;
}>;

type FocusElement = {
  readonly id: string;
  enabled: boolean;
  onActivate: (() => void) | undefined;
  seenFrame: number;
};

type FocusSection = {
  readonly id: string;
  elements: FocusElement[];
  selectedId: string | null;
  touchedFrame: number;
};

/** A pushed section and what it covers. */
type SectionLayer = Readonly<{
  sectionId: string;
  /** Active section when the layer was pushed. */
  previous: string | null;
  /** Sections that existed under the layer; kept while untouched. */
  suspended: ReadonlySet<string>;
}>;

export class FocusManager {
  private readonly sections = new Map<string, FocusSection>();
  private layers: SectionLayer[] = [];
  private activeId: string | null = null;
  private frame = 0;
  private inFrame = false;
  /** element id -> section id, for registrations made in the current frame. */
  private readonly frameOwners = new Map<string, string>();
  private readonly warn: ((message: string) => void) | undefined;
  private readonly onChange: (() => void) | undefined;
  private readonly autoActivate: boolean;

  constructor(options: FocusManagerOptions = {}) {
    this.warn = options.warn;
    this.onChange = options.onChange;
    this.autoActivate = options.autoActivate !== false;
  }

  /* ---------- Registration ---------- */

  /** Idempotent. Unless disabled, the first section registered while none is active becomes active. */
  registerSection(id: string): void {
    let section = this.sections.get(id);
    if (section === undefined) {
      section = { id, elements: [], selectedId: null, touchedFrame: -1 };
      this.sections.set(id, section);
    }
    if (this.inFrame) section.touchedFrame = this.frame;
    if (this.activeId === null && this.autoActivate) {
      this.activeId = id;
      this.changed();
    }
  }

  registerFocusable(sectionId: string, registration: FocusableRegistration): void {
    this.registerSection(sectionId);
    const section = this.sections.get(sectionId);
    if (section === undefined) return;

    const { id } = registration;
    if (this.inFrame) {
      const owner = this.frameOwners.get(id);
      if (owner !== undefined && owner !== sectionId) {
        this.warn?.(
          `focusable "${id}" registered in sections "${owner}" and "${sectionId}" in one frame`,
        );
      }
      this.frameOwners.set(id, sectionId);
    }

    const enabled = registration.enabled !== false;
    const existing = section.elements.find((e) => e.id === id);
    if (existing !== undefined) {
      existing.enabled = enabled;
      existing.onActivate = registration.onActivate;
      existing.seenFrame = this.frame;
    } else {
      section.elements.push({ id, enabled, onActivate: registration.onActivate, seenFrame: this.frame });
    }

    if (section.selectedId === null && enabled) {
      section.selectedId = id;
      this.changed();
    }
  }

  /* ---------- Activation ---------- */

  /**
   * Make `id` the active section. The previously active section keeps its
   * selection. Returns false (and changes nothing) for an unknown id.
   */
  activateSection(id: string, options: Readonly<{ selection?: SelectionPolicy }> = {}): boolean {
    const section = this.sections.get(id);
    if (section === undefined) {
      this.warn?.(`activateSection("${id}") ignored: no such section`);
      return false;
    }
    if (options.selection === "reset") {
      section.selectedId = firstEnabledId(section);
    }
    if (this.activeId !== id || options.selection === "reset") {
      this.activeId = id;
      this.changed();
    }
    return true;
  }

  deactivate(): void {
    if (this.activeId === null) return;
    this.activeId = null;
    this.changed();
  }

  /** Forget a section and its elements. Deactivates it when active. */
  clearSection(id: string): void {
    if (!this.sections.delete(id)) return;
    if (this.activeId === id) this.activeId = null;
    this.changed();
  }

  clear(): void {
    this.sections.clear();
    this.frameOwners.clear();
    this.layers = [];
    this.activeId = null;
    this.changed();
  }

  /* ---------- Layers ---------- */

  /**
   * Activate `id` over the current sections. They keep their elements and
   * selection while untouched, until `popSection(id)` or until `id` misses a
   * frame. Returns false for an unknown or already pushed id.
   */
  pushSection(id: string): boolean {
    if (!this.sections.has(id) || this.isPushed(id)) return false;
    const suspended = new Set(this.sections.keys());
    suspended.delete(id);
    this.layers.push({ sectionId: id, previous: this.activeId, suspended });
    return this.activateSection(id);
  }

  /** Forget a pushed section and reactivate the one it covered. */
  popSection(id: string): boolean {
    const index = this.layers.findIndex((layer) => layer.sectionId === id);
    const layer = this.layers[index];
    if (layer === undefined) return false;
    this.layers.splice(index, 1);
    this.dropLayerSection(layer);
    return true;
  }

  isPushed(id: string): boolean {
    return this.layers.some((layer) => layer.sectionId === id);
  }

  activateNextSection(): boolean {
    return this.cycleSection("next");
  }

  activatePreviousSection(): boolean {
    return this.cycleSection("prev");
  }

  private cycleSection(move: FocusMove): boolean {
    const target = computeMovedFocusId(this.sectionIds(), this.activeId, move);
    if (target === null || target === this.activeId) return false;
    return this.activateSection(target);
  }

  /* ---------- Navigation ---------- */

  next(): boolean {
    return this.move("next");
  }

  previous(): boolean {
    return this.move("prev");
  }

  private move(direction: FocusMove): boolean {
    const section = this.activeSection();
    if (section === undefined) return false;
    const enabled = section.elements.filter((e) => e.enabled).map((e) => e.id);
    const target = computeMovedFocusId(enabled, section.selectedId, direction);
    if (target === null) return false;
    if (target !== section.selectedId) {
      section.selectedId = target;
      this.changed();
    }
    return true;
  }

  /** Run the selected element's callback. False when nothing enabled is selected. */
  activate(): boolean {
    const section = this.activeSection();
    if (section === undefined || section.selectedId === null) return false;
    const selected = section.elements.find((e) => e.id === section.selectedId);
    if (selected === undefined || !selected.enabled) return false;
    selected.onActivate?.();
    return true;
  }

  /**
   * Tab / Down / Right: next. Shift+Tab / Up / Left: previous.
   * Enter / Space: activate. Returns whether the event was consumed.
   */
  handleKey(event: KeyEvent): boolean {
    if (event.ctrl || event.alt || event.key.kind !== "named") return false;
    switch (event.key.name) {
      case "tab":
        return event.shift ? this.previous() : this.next();
      case "down":
      case "right":
        return this.next();
      case "up":
      case "left":
        return this.previous();
      case "enter":
      case "space":
        return this.activate();
      default:
        return false;
    }
  }

  /* ---------- Queries ---------- */

  get activeSectionId(): string | null {
    return this.activeId;
  }

  /** Selected element of `sectionId` (default: the active section). */
  selectedId(sectionId?: string): string | null {
    const id = sectionId ?? this.activeId;
    if (id === null) return null;
    return this.sections.get(id)?.selectedId ?? null;
  }

  /** True when `id` is the selection of the active section. */
  isSelected(id: string): boolean {
    return this.activeSection()?.selectedId === id;
  }

  isSectionActive(id: string): boolean {
    return this.activeId === id;
  }

  hasSection(id: string): boolean {
    return this.sections.has(id);
  }

  sectionIds(): readonly string[] {
    return Array.from(this.sections.keys());
  }

  elementIds(sectionId: string): readonly string[] {
    return this.sections.get(sectionId)?.elements.map((e) => e.id) ?? [];
  }

  /* ---------- Frame bookkeeping ---------- */

  beginFrame(): void {
    this.frame++;
    this.inFrame = true;
    this.frameOwners.clear();
  }

  endFrame(): void {
    this.inFrame = false;
    for (const section of this.sections.values()) {
      if (section.touchedFrame !== this.frame) continue;
      this.pruneSection(section);
    }
    this.popVanishedLayers();
    this.dropVanishedSections();
  }

  private touched(id: string): boolean {
    return this.sections.get(id)?.touchedFrame === this.frame;
  }

  /** Topmost first, so an active layer falls back through the ones it covered. */
  private popVanishedLayers(): void {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      if (layer === undefined || this.touched(layer.sectionId)) continue;
      this.layers.splice(i, 1);
      this.dropLayerSection(layer);
    }
  }

  private dropLayerSection(layer: SectionLayer): void {
    this.sections.delete(layer.sectionId);
    if (this.activeId !== layer.sectionId) return;
    this.activeId = layer.previous !== null && this.sections.has(layer.previous) ? layer.previous : null;
    this.changed();
  }

  private dropVanishedSections(): void {
    const suspended = new Set<string>();
    for (const layer of this.layers) {
      for (const id of layer.suspended) suspended.add(id);
    }
    let firstTouched: string | null = null;
    for (const section of Array.from(this.sections.values())) {
      if (section.touchedFrame === this.frame) {
        if (firstTouched === null) firstTouched = section.id;
      } else if (!suspended.has(section.id)) {
        this.sections.delete(section.id);
      }
    }
    if (this.activeId !== null && this.sections.has(this.activeId)) return;
    const next = this.autoActivate ? firstTouched : null;
    if (next === this.activeId) return;
    this.activeId = next;
    this.changed();
  }

  private pruneSection(section: FocusSection): void {
    const before = section.elements;
    const kept = before.filter((e) => e.seenFrame === this.frame);
    const selectedIndex = section.selectedId === null ? -1 : before.findIndex((e) => e.id === section.selectedId);
    section.elements = kept;

    const selected = selectedIndex < 0 ? undefined : before[selectedIndex];
    if (selected !== undefined && selected.seenFrame === this.frame && selected.enabled) return;

    let nextSelected: string | null = null;
    if (selectedIndex < 0) {
      nextSelected = firstEnabledId(section);
    } else {
      // Nearest enabled survivor at or after the old position, else before it.
      const keptBefore = before.slice(0, selectedIndex).filter((e) => e.seenFrame === this.frame).length;
      const after = kept.slice(keptBefore).find((e) => e.enabled && e.id !== selected?.id);
      const prior = kept.slice(0, keptBefore).reverse().find((e) => e.enabled);
      nextSelected = after?.id ?? prior?.id ?? null;
    }
    if (nextSelected !== section.selectedId) {
      section.selectedId = nextSelected;
      this.changed();
    }
  }

  private activeSection(): FocusSection | undefined {
    return this.activeId === null ? undefined : this.sections.get(this.activeId);
  }

  private changed(): void {
    this.onChange?.();
  }
}

function firstEnabledId(section: FocusSection): string | null {
  return section.elements.find((e) => e.enabled)?.id ?? null;
}
