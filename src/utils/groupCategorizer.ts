import { GroupCategory } from '../types/roster';

export const DEFAULT_GROUP_SEPARATOR = '/';

export interface GroupCategoryRule {
  category: Exclude<GroupCategory, 'Other'>;
  matches: (groupName: string) => boolean;
}

/**
 * Evaluated top to bottom; the first match wins. Order matters because some
 * markers are substrings of others (a district EMS office is not a chief post).
 */
export const GROUP_CATEGORY_RULES: readonly GroupCategoryRule[] = [
  {
    category: 'Medic',
    matches: name => name.includes('Medic') && !name.includes('73')
  },
  {
    category: 'OnDutyAssistant',
    matches: name => name.includes('On-Duty')
  },
  {
    category: 'DistrictChief',
    matches: name => name.includes('District') && !name.includes('EMS')
  },
  {
    category: 'TravelerAM',
    matches: name => name.includes('Travelers AM')
  },
  {
    category: 'TravelerPM',
    matches: name => name.includes('Travelers PM')
  }
];

export function categorizeGroup(
  groupName: string,
  rules: readonly GroupCategoryRule[] = GROUP_CATEGORY_RULES
): GroupCategory {
  const rule = rules.find(candidate => candidate.matches(groupName));
  return rule ? rule.category : 'Other';
}

/**
 * Categorizes a unit by its display name first. A unit whose display name matches
 * no rule takes the category of the first full section label that does, so
 * `"District 3 / Station 12"` still counts as a district post.
 */
export function categorizeUnit(
  unitName: string,
  labels: readonly string[],
  rules: readonly GroupCategoryRule[] = GROUP_CATEGORY_RULES
): GroupCategory {
  for (const candidate of [unitName, ...labels]) {
    const category = categorizeGroup(candidate, rules);
    if (category !== 'Other') return category;
  }
  return 'Other';
}

/**
 * `"District 3 / Station 12"` becomes `"Station 12"`; names without the separator are kept.
 */
export function truncateGroupName(groupName: string, separator: string = DEFAULT_GROUP_SEPARATOR): string {
  const parts = groupName.split(separator);
  if (parts.length > 1) {
    return parts[parts.length - 1].trim();
  }
  return groupName;
}

export function groupSortKey(groupName: string, separator: string = DEFAULT_GROUP_SEPARATOR): string {
  const index = groupName.indexOf(separator);
  return index === -1 ? groupName : groupName.slice(index + separator.length);
}

// Code-point order, independent of the host locale
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
