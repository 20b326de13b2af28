import { describe, it, expect } from '@jest/globals';
import { CHILD_LEVEL, HIERARCHY_LEVELS, PARENT_LEVEL } from './levels.js';

describe('Hierarchy levels', () => {
  it('lists levels from root to leaf', () => {
    expect(HIERARCHY_LEVELS).toEqual(['project', 'subproject', 'task', 'subtask']);
  });

  it('maps each child level to the level directly above it', () => {
    expect(PARENT_LEVEL.subproject).toBe('project');
    expect(PARENT_LEVEL.task).toBe('subproject');
    expect(PARENT_LEVEL.subtask).toBe('task');
  });

  it('is the inverse of the child level table', () => {
    for (const [branch, child] of Object.entries(CHILD_LEVEL)) {
      expect(PARENT_LEVEL[child]).toBe(branch);
    }
  });
});
