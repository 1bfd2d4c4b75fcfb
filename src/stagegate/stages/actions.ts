import type { Element } from '../element/element';
import { show } from '../locks/messages';
import { createAction, EVALUATION_STATES, type Action, type ActionType, type EvaluationState, type Priority } from '../process/result';
import { frozenRecord } from '../shared/freeze';

export interface ActionTemplate {
  type: ActionType;
  description: string;
  priority?: Priority;
  conditions?: readonly string[];
  metadata?: Record<string, unknown>;
  /** placeholder name -> property path */
  properties?: Record<string, string>;
}

export type ActionTemplates = Partial<Record<EvaluationState, readonly ActionTemplate[]>>;

/** Copies templates so later edits by the caller do not leak in. */
export function freezeTemplates(templates: ActionTemplates): Readonly<ActionTemplates> {
  const out: ActionTemplates = {};
  for (const state of EVALUATION_STATES) {
    const list = templates[state];
    if (list) out[state] = Object.freeze(list.map(freezeTemplate));
  }
  return Object.freeze(out);
}

function freezeTemplate(template: ActionTemplate): ActionTemplate {
  return Object.freeze({
    ...template,
    conditions: template.conditions ? Object.freeze([...template.conditions]) : undefined,
    metadata: template.metadata ? frozenRecord(template.metadata) : undefined,
    properties: template.properties ? Object.freeze({ ...template.properties }) : undefined,
  });
}

const PLACEHOLDER = /\{([A-Za-z_][\w.]*)\}/g;

function renderValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  return show(value);
}

/**
 * Fills `{name}` placeholders: bound property values first, then caller
 * context. Unknown placeholders stay verbatim.
 */
export function renderTemplate(
  text: string,
  element: Element,
  properties: Record<string, string> = {},
  context: Record<string, unknown> = {},
): string {
  return text.replace(PLACEHOLDER, (match, name: string) => {
    if (Object.prototype.hasOwnProperty.call(properties, name)) {
      const lookup = element.lookup(properties[name]);
      return lookup.found ? renderValue(lookup.value) : '';
    }
    if (Object.prototype.hasOwnProperty.call(context, name)) {
      return renderValue(context[name]);
    }
    return match;
  });
}

export function resolveTemplate(
  template: ActionTemplate,
  element: Element,
  context: Record<string, unknown> = {},
): Action {
  const properties = template.properties ?? {};
  return createAction(template.type, renderTemplate(template.description, element, properties, context), {
    priority: template.priority,
    conditions: (template.conditions ?? []).map(c => renderTemplate(c, element, properties, context)),
    metadata: { ...(template.metadata ?? {}) },
  });
}
