/**
 * JSON schema fragments shared by the hierarchy routes.
 * Length limits apply to trimmed values and are checked by the entity model.
 */

const nodeFieldProperties = {
  name: { type: 'string' },
  description: { type: ['string', 'null'] },
  deadline: { type: ['string', 'null'], format: 'date' },
} as const;

const estimatedHoursProperty = { type: 'number', exclusiveMinimum: 0 } as const;

export const createNodeBody = {
  type: 'object',
  required: ['name'],
  properties: nodeFieldProperties,
  additionalProperties: false,
} as const;

export const createSubtaskBody = {
  type: 'object',
  required: ['name', 'estimatedHours'],
  properties: { ...nodeFieldProperties, estimatedHours: estimatedHoursProperty },
  additionalProperties: false,
} as const;

export const updateNodeBody = {
  type: 'object',
  properties: nodeFieldProperties,
  additionalProperties: false,
  minProperties: 1,
} as const;

export const updateSubtaskBody = {
  type: 'object',
  properties: { ...nodeFieldProperties, estimatedHours: estimatedHoursProperty },
  additionalProperties: false,
  minProperties: 1,
} as const;

// Integer id in the path
export const idParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
} as const;

// Integer parent id in the path (nested prefix)
export const parentIdParams = {
  type: 'object',
  required: ['parentId'],
  properties: {
    parentId: { type: 'integer', minimum: 1 },
  },
} as const;

// Integer parent id and child id in the path
export const parentAndIdParams = {
  type: 'object',
  required: ['parentId', 'id'],
  properties: {
    parentId: { type: 'integer', minimum: 1 },
    id: { type: 'integer', minimum: 1 },
  },
} as const;
