import { FAMILY_GROUPS } from '../data/family-groups';
import type { FamilyGroup, FamilyLabel } from '../shared/types';

const FAMILY_ORDER: FamilyGroup[] = ['Pritchett', 'Dunphy', 'Tucker-Pritchett'];

/**
 * Family group a character belongs to. Names are matched case-sensitively;
 * anyone outside the table is 'Unknown'.
 */
export function familyOf(character: string): FamilyLabel {
  for (const family of FAMILY_ORDER) {
    if (FAMILY_GROUPS[family].includes(character)) {
      return family;
    }
  }
  return 'Unknown';
}
