import type { FamilyGroup } from '../shared/types';

export const FAMILY_GROUPS: Readonly<Record<FamilyGroup, readonly string[]>> = Object.freeze({
  'Pritchett': ['Jay', 'Gloria', 'Manny', 'Joe'],
  'Dunphy': ['Claire', 'Phil', 'Haley', 'Alex', 'Luke'],
  'Tucker-Pritchett': ['Mitchell', 'Cameron', 'Lily'],
});
