// ============================================================================
// UI QUERY TYPES: locators, actions and the render facade contract
// ============================================================================

/** ARIA roles the choice strategy falls back to. */
export type UiRole = "radio" | "option";

/**
 * Declarative query against the current render.
 * - `css`: attribute/structural CSS selector
 * - `text`: a button (or role=button node) whose accessible name is, or contains, `text`
 * - `role`: any node with the given ARIA role, optionally narrowed by name
 */
export type Locator =
  | { kind: "css"; selector: string }
  | { kind: "text"; text: string; exact: boolean }
  | { kind: "role"; role: UiRole; name?: string };

/** Ordered locators; earlier entries are preferred and a match short-circuits the rest. */
export type LocatorSet = readonly Locator[];

export type UiAction =
  | { kind: "click" }
  | { kind: "type"; text: string; submitKey?: string };

/**
 * Query/act facade over one live render. `H` is the opaque, per-turn element
 * handle; a handle must not be kept once the turn that produced it ends.
 *
 * Absence is never an error: `findFirst` returns null and `findAll` an empty
 * list. Only a lost session is thrown (as InfrastructureError).
 */
export interface UiQuery<H> {
  findFirst(locators: LocatorSet): Promise<H | null>;
  findAll(locator: Locator): Promise<H[]>;
  /**
   * Scroll into view and perform the action; on obstruction retry once with a
   * forced dispatch. Resolves false for ordinary interaction failure.
   */
  safeAct(handle: H, action: UiAction): Promise<boolean>;
}

export const CLICK: UiAction = { kind: "click" };
