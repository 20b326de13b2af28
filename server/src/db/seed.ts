import type { NodeDraft } from '@estimator/shared';
import type { PersistenceGateway } from './persistenceGateway.js';

/**
 * Insert the demo renovation project into an empty database.
 * Does nothing when any project already exists.
 * @returns number of nodes inserted
 */
export function seedDemoData(gateway: PersistenceGateway): number {
  if (gateway.countProjects() > 0) {
    return 0;
  }

  let inserted = 0;
  const insert = (draft: NodeDraft): number => {
    inserted++;
    return gateway.insert(draft);
  };

  const projectId = insert({
    level: 'project',
    name: 'Renovation',
    description: 'Renovation of two homes',
    deadline: '2025-12-17',
  });

  const houseA = insert({
    level: 'subproject',
    parentId: projectId,
    name: 'House A',
    description: 'Apartment on the second floor',
    deadline: '2025-12-01',
  });
  const houseB = insert({
    level: 'subproject',
    parentId: projectId,
    name: 'House B',
    description: 'Detached house by the beach',
    deadline: '2025-12-11',
  });

  const removeFloor = insert({
    level: 'task',
    parentId: houseA,
    name: 'Remove floor',
    description: 'Remove old floor and debris',
    deadline: '2025-11-20',
  });
  const wiring = insert({
    level: 'task',
    parentId: houseA,
    name: 'New wiring',
    description: 'Upgrade the electrical installation',
    deadline: '2025-11-25',
  });
  const facade = insert({
    level: 'task',
    parentId: houseB,
    name: 'Clean facade',
    description: 'Clean and repair the facade',
    deadline: '2025-12-05',
  });

  insert({
    level: 'subtask',
    parentId: removeFloor,
    name: 'Tear up floor',
    description: 'Tear up and dispose of the floor',
    deadline: '2025-11-18',
    estimatedHours: 6,
  });
  insert({
    level: 'subtask',
    parentId: removeFloor,
    name: 'Sort materials',
    description: 'Sort recyclables from waste',
    deadline: '2025-11-19',
    estimatedHours: 2,
  });
  insert({
    level: 'subtask',
    parentId: wiring,
    name: 'Install fuse board',
    description: 'Mount new board and fuses',
    deadline: '2025-11-24',
    estimatedHours: 8,
  });
  insert({
    level: 'subtask',
    parentId: facade,
    name: 'Pressure-wash',
    description: 'Pressure-wash the facade',
    deadline: '2025-12-02',
    estimatedHours: 4.5,
  });

  return inserted;
}
