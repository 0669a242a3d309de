/**
 * Output schemas for each agent role.
 *
 * Static data: one frozen schema per role, selected by the loop.
 */

import type { AgentRoleType, AgentSchema, FieldSpec } from '../types.js';
import { DebugTarget } from '../types.js';

/** Build an immutable schema. Decision fields must list their choices. */
export function defineSchema(role: AgentRoleType, fields: FieldSpec[]): AgentSchema {
  for (const field of fields) {
    if (field.kind === 'decision' && (!field.choices || field.choices.length === 0)) {
      throw new Error(`Decision field "${field.name}" of ${role} schema has no choices`);
    }
  }
  const frozen = fields.map((f) =>
    Object.freeze({ ...f, ...(f.choices ? { choices: Object.freeze([...f.choices]) } : {}) }),
  );
  return Object.freeze({ role, fields: Object.freeze(frozen) });
}

export const PLANNER_SCHEMA = defineSchema('planner', [
  { name: 'Analysis', kind: 'text', required: false },
  { name: 'User Story', kind: 'text', required: true },
]);

export const CODER_SCHEMA = defineSchema('coder', [
  { name: 'Reasoning', kind: 'text', required: false },
  { name: 'Content', kind: 'code', required: true },
  { name: 'Metadata', kind: 'json', required: true },
]);

export const TESTER_SCHEMA = defineSchema('tester', [
  { name: 'Reasoning', kind: 'text', required: false },
  { name: 'Content', kind: 'code', required: true },
  { name: 'Metadata', kind: 'json', required: true },
]);

export const DEBUGGER_SCHEMA = defineSchema('debugger', [
  { name: 'Reasoning', kind: 'text', required: false },
  { name: 'Target', kind: 'decision', required: true, choices: DebugTarget.options },
  { name: 'Source', kind: 'code', required: false },
  { name: 'Test', kind: 'code', required: false },
]);

export const ROLE_SCHEMAS: Record<AgentRoleType, AgentSchema> = {
  planner: PLANNER_SCHEMA,
  coder: CODER_SCHEMA,
  tester: TESTER_SCHEMA,
  debugger: DEBUGGER_SCHEMA,
};
