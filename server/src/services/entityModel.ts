import type {
  ChildLevel,
  CreateNodeRequest,
  NodeDraft,
  NodeFields,
  TreeNode,
  UpdateNodeRequest,
} from '@estimator/shared';
import { ok, fail } from '../errors/result.js';
import type { Result } from '../errors/result.js';

export const NAME_MAX_LENGTH = 50;
export const DESCRIPTION_MAX_LENGTH = 200;

/** ISO 8601 date: YYYY-MM-DD */
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when the string is YYYY-MM-DD and names a day that exists (no 2025-02-30).
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

// Code points, as counted by SQLite's length() and JSON schema maxLength
function characterCount(value: string): number {
  return [...value].length;
}

function validateName(name: unknown): Result<string> {
  if (typeof name !== 'string' || name.trim().length === 0) {
    return fail('ValidationError', 'Name cannot be empty', { field: 'name' });
  }
  const trimmed = name.trim();
  if (characterCount(trimmed) > NAME_MAX_LENGTH) {
    return fail('ValidationError', `Name must be ${NAME_MAX_LENGTH} characters or fewer`, {
      field: 'name',
    });
  }
  return ok(trimmed);
}

function validateDescription(description: string | null | undefined): Result<string | null> {
  if (description === undefined || description === null) return ok(null);
  const trimmed = description.trim();
  if (characterCount(trimmed) > DESCRIPTION_MAX_LENGTH) {
    return fail(
      'ValidationError',
      `Description must be ${DESCRIPTION_MAX_LENGTH} characters or fewer`,
      { field: 'description' },
    );
  }
  return ok(trimmed.length === 0 ? null : trimmed);
}

function validateDeadline(deadline: string | null | undefined): Result<string | null> {
  if (deadline === undefined || deadline === null) return ok(null);
  if (!isCalendarDate(deadline)) {
    return fail('ValidationError', 'Deadline must be an ISO 8601 date (YYYY-MM-DD)', {
      field: 'deadline',
    });
  }
  return ok(deadline);
}

/**
 * Validate and normalize the fields every level shares.
 */
export function validateNodeFields(input: CreateNodeRequest): Result<NodeFields> {
  const name = validateName(input.name);
  if (!name.success) return name;
  const description = validateDescription(input.description);
  if (!description.success) return description;
  const deadline = validateDeadline(input.deadline);
  if (!deadline.success) return deadline;

  return ok({ name: name.data, description: description.data, deadline: deadline.data });
}

/**
 * Subtask hours must be present, finite and strictly positive.
 */
export function validateEstimatedHours(value: unknown): Result<number> {
  if (value === undefined || value === null) {
    return fail('ValidationError', 'Estimated hours are required for subtasks', {
      field: 'estimatedHours',
    });
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fail('ValidationError', 'Estimated hours must be greater than 0', {
      field: 'estimatedHours',
      value,
    });
  }
  return ok(value);
}

function rejectHours(level: 'project' | 'subproject' | 'task'): Result<never> {
  return fail('ValidationError', `Estimated hours can only be set on subtasks, not on a ${level}`, {
    field: 'estimatedHours',
  });
}

/**
 * Build the insert value for a new project.
 */
export function buildProjectDraft(input: CreateNodeRequest): Result<NodeDraft> {
  if (input.estimatedHours !== undefined) return rejectHours('project');
  const fields = validateNodeFields(input);
  if (!fields.success) return fields;
  const draft: NodeDraft = { level: 'project', ...fields.data };
  return ok(draft);
}

/**
 * Build the insert value for a new child node under parentId.
 * Parent existence is not checked here; see the hierarchy validator.
 */
export function buildChildDraft(
  level: ChildLevel,
  parentId: number,
  input: CreateNodeRequest,
): Result<NodeDraft> {
  const fields = validateNodeFields(input);
  if (!fields.success) return fields;

  if (level === 'subtask') {
    const hours = validateEstimatedHours(input.estimatedHours);
    if (!hours.success) return hours;
    const draft: NodeDraft = { level, parentId, ...fields.data, estimatedHours: hours.data };
    return ok(draft);
  }

  if (input.estimatedHours !== undefined) return rejectHours(level);
  const draft: NodeDraft = { level, parentId, ...fields.data };
  return ok(draft);
}

/**
 * Merge a partial update into an existing node. id, level and parentId never change.
 */
export function applyUpdate(node: TreeNode, input: UpdateNodeRequest): Result<TreeNode> {
  if (
    input.name === undefined &&
    input.description === undefined &&
    input.deadline === undefined &&
    input.estimatedHours === undefined
  ) {
    return fail('ValidationError', 'At least one field must be provided');
  }

  const fields = validateNodeFields({
    name: input.name ?? node.name,
    description: input.description === undefined ? node.description : input.description,
    deadline: input.deadline === undefined ? node.deadline : input.deadline,
  });
  if (!fields.success) return fields;

  if (node.level === 'subtask') {
    if (input.estimatedHours === undefined) {
      return ok({ ...node, ...fields.data });
    }
    const hours = validateEstimatedHours(input.estimatedHours);
    if (!hours.success) return hours;
    return ok({ ...node, ...fields.data, estimatedHours: hours.data });
  }

  if (input.estimatedHours !== undefined) return rejectHours(node.level);
  return ok({ ...node, ...fields.data });
}
