import type { ConditionRecord } from 'policy-query-filter';

export interface ExtractBody {
  policy: string;
}

export interface CompileBody {
  conditionGroups: ConditionRecord[][];
  bindings: Record<string, string>;
}

export interface TranslateBody {
  policy: string;
  bindings: Record<string, string>;
}

const bindingsSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const;

const conditionRecordSchema = {
  type: 'object',
  required: ['index', 'field', 'operator', 'value'],
  properties: {
    index: { type: 'string' },
    field: { type: 'string' },
    operator: { type: 'string' },
    value: { type: 'string' },
  },
} as const;

export const extractBodySchema = {
  type: 'object',
  required: ['policy'],
  properties: {
    policy: { type: 'string' },
  },
} as const;

export const compileBodySchema = {
  type: 'object',
  required: ['conditionGroups', 'bindings'],
  properties: {
    conditionGroups: {
      type: 'array',
      items: { type: 'array', items: conditionRecordSchema },
    },
    bindings: bindingsSchema,
  },
} as const;

export const translateBodySchema = {
  type: 'object',
  required: ['policy', 'bindings'],
  properties: {
    policy: { type: 'string' },
    bindings: bindingsSchema,
  },
} as const;
