import { describe, it, expect } from '@jest/globals';
import type { SubTask, Task } from '@estimator/shared';
import {
  applyUpdate,
  buildChildDraft,
  buildProjectDraft,
  isCalendarDate,
  validateEstimatedHours,
  validateNodeFields,
} from './entityModel.js';

describe('Entity Model', () => {
  describe('isCalendarDate()', () => {
    it('accepts real dates', () => {
      expect(isCalendarDate('2025-12-17')).toBe(true);
      expect(isCalendarDate('2024-02-29')).toBe(true);
    });

    it('rejects impossible dates and other formats', () => {
      expect(isCalendarDate('2025-02-29')).toBe(false);
      expect(isCalendarDate('2025-13-01')).toBe(false);
      expect(isCalendarDate('2025-12-17T10:00:00Z')).toBe(false);
      expect(isCalendarDate('17-12-2025')).toBe(false);
    });
  });

  describe('validateNodeFields()', () => {
    it('trims the name and normalizes missing optional fields to null', () => {
      const result = validateNodeFields({ name: '  Renovation  ' });

      expect(result).toEqual({
        success: true,
        data: { name: 'Renovation', description: null, deadline: null },
      });
    });

    it('turns a blank description into null', () => {
      const result = validateNodeFields({ name: 'P', description: '   ' });

      expect(result.success && result.data.description).toBeNull();
    });

    it('rejects a blank name', () => {
      const result = validateNodeFields({ name: '   ' });

      expect(result).toEqual({
        success: false,
        error: { kind: 'ValidationError', message: 'Name cannot be empty', details: { field: 'name' } },
      });
    });

    it('accepts a name of exactly 50 characters and rejects 51', () => {
      expect(validateNodeFields({ name: 'a'.repeat(50) }).success).toBe(true);

      const result = validateNodeFields({ name: 'a'.repeat(51) });
      expect(result.success).toBe(false);
      expect(!result.success && result.error.message).toBe('Name must be 50 characters or fewer');
    });

    it('counts characters outside the basic plane once each', () => {
      // Each emoji is two UTF-16 code units
      expect(validateNodeFields({ name: '🏠'.repeat(50) })).toEqual({
        success: true,
        data: { name: '🏠'.repeat(50), description: null, deadline: null },
      });

      const result = validateNodeFields({ name: '🏠'.repeat(51) });
      expect(!result.success && result.error.message).toBe('Name must be 50 characters or fewer');
    });

    it('measures the name after trimming', () => {
      const result = validateNodeFields({ name: '  ' + 'a'.repeat(48) + '  ' });

      expect(result.success && result.data.name).toBe('a'.repeat(48));
    });

    it('accepts a description of 200 emoji and rejects 201', () => {
      expect(validateNodeFields({ name: 'P', description: '🧱'.repeat(200) }).success).toBe(true);

      const result = validateNodeFields({ name: 'P', description: '🧱'.repeat(201) });
      expect(!result.success && result.error.message).toBe(
        'Description must be 200 characters or fewer',
      );
    });

    it('rejects a description over 200 characters', () => {
      const result = validateNodeFields({ name: 'P', description: 'd'.repeat(201) });

      expect(!result.success && result.error.details).toEqual({ field: 'description' });
    });

    it('rejects an invalid deadline', () => {
      const result = validateNodeFields({ name: 'P', deadline: '2025-02-30' });

      expect(!result.success && result.error).toEqual({
        kind: 'ValidationError',
        message: 'Deadline must be an ISO 8601 date (YYYY-MM-DD)',
        details: { field: 'deadline' },
      });
    });
  });

  describe('validateEstimatedHours()', () => {
    it('accepts positive hours', () => {
      expect(validateEstimatedHours(0.5)).toEqual({ success: true, data: 0.5 });
    });

    it.each([0, -1, -0.25, Number.NaN, Number.POSITIVE_INFINITY])('rejects %p', (hours) => {
      const result = validateEstimatedHours(hours);

      expect(result.success).toBe(false);
      expect(!result.success && result.error.kind).toBe('ValidationError');
      expect(!result.success && result.error.message).toBe('Estimated hours must be greater than 0');
    });

    it('rejects missing hours', () => {
      const result = validateEstimatedHours(undefined);

      expect(!result.success && result.error.message).toBe(
        'Estimated hours are required for subtasks',
      );
    });

    it('rejects a non-numeric value', () => {
      expect(validateEstimatedHours('6').success).toBe(false);
    });
  });

  describe('buildProjectDraft()', () => {
    it('builds a project draft', () => {
      const result = buildProjectDraft({ name: 'Renovation', deadline: '2025-12-17' });

      expect(result).toEqual({
        success: true,
        data: { level: 'project', name: 'Renovation', description: null, deadline: '2025-12-17' },
      });
    });

    it('rejects estimated hours on a project', () => {
      const result = buildProjectDraft({ name: 'Renovation', estimatedHours: 3 });

      expect(!result.success && result.error.details).toEqual({ field: 'estimatedHours' });
    });
  });

  describe('buildChildDraft()', () => {
    it('builds a subtask draft with hours', () => {
      const result = buildChildDraft('subtask', 3, { name: 'Tear up floor', estimatedHours: 6 });

      expect(result).toEqual({
        success: true,
        data: {
          level: 'subtask',
          parentId: 3,
          name: 'Tear up floor',
          description: null,
          deadline: null,
          estimatedHours: 6,
        },
      });
    });

    it('fails for a subtask with zero hours', () => {
      const result = buildChildDraft('subtask', 3, { name: 'Tear up floor', estimatedHours: 0 });

      expect(!result.success && result.error.kind).toBe('ValidationError');
    });

    it('fails for a subtask without hours', () => {
      const result = buildChildDraft('subtask', 3, { name: 'Tear up floor' });

      expect(!result.success && result.error.details).toEqual({ field: 'estimatedHours' });
    });

    it('rejects hours on a task', () => {
      const result = buildChildDraft('task', 2, { name: 'Remove floor', estimatedHours: 8 });

      expect(!result.success && result.error.message).toBe(
        'Estimated hours can only be set on subtasks, not on a task',
      );
    });

    it('reports the name before the hours', () => {
      const result = buildChildDraft('subtask', 3, { name: '', estimatedHours: -1 });

      expect(!result.success && result.error.details).toEqual({ field: 'name' });
    });
  });

  describe('applyUpdate()', () => {
    const task: Task = {
      level: 'task',
      id: 3,
      parentId: 2,
      name: 'Remove floor',
      description: 'Old floor',
      deadline: '2025-11-20',
    };
    const subtask: SubTask = {
      level: 'subtask',
      id: 4,
      parentId: 3,
      name: 'Tear up floor',
      description: null,
      deadline: null,
      estimatedHours: 6,
    };

    it('merges provided fields and keeps id and parent', () => {
      const result = applyUpdate(task, { name: 'Remove old floor' });

      expect(result).toEqual({
        success: true,
        data: { ...task, name: 'Remove old floor' },
      });
    });

    it('clears description and deadline when null is given', () => {
      const result = applyUpdate(task, { description: null, deadline: null });

      expect(result.success && result.data).toEqual({ ...task, description: null, deadline: null });
    });

    it('updates subtask hours', () => {
      const result = applyUpdate(subtask, { estimatedHours: 7.5 });

      expect(result.success && result.data).toEqual({ ...subtask, estimatedHours: 7.5 });
    });

    it('rejects non-positive subtask hours', () => {
      const result = applyUpdate(subtask, { estimatedHours: 0 });

      expect(!result.success && result.error.kind).toBe('ValidationError');
    });

    it('rejects hours on a task', () => {
      const result = applyUpdate(task, { estimatedHours: 2 });

      expect(!result.success && result.error.details).toEqual({ field: 'estimatedHours' });
    });

    it('rejects an empty update', () => {
      const result = applyUpdate(task, {});

      expect(!result.success && result.error.message).toBe('At least one field must be provided');
    });

    it('rejects a blank name', () => {
      const result = applyUpdate(task, { name: ' ' });

      expect(!result.success && result.error.message).toBe('Name cannot be empty');
    });
  });
});
