import { ALL, type FilterAttribute, type FilterCriteria, type Item, type ItemBank } from "./itemTypes";

export const NO_FILTER: FilterCriteria = { domain: ALL, subSpecialty: ALL };

/** "All" followed by the distinct values present in the bank, sorted. */
export function filterChoices(bank: ItemBank, attribute: FilterAttribute): string[] {
  const values = new Set<string>();
  for (const it of bank.items) values.add(it[attribute]);
  return [ALL, ...[...values].sort()];
}

function matches(selected: string, value: string) {
  return selected === ALL || selected === value;
}

// Always derived from the full bank, never from a previous view.
export function filterItems(bank: ItemBank, criteria: FilterCriteria): Item[] {
  return bank.items.filter((it) => matches(criteria.domain, it.domain) && matches(criteria.subSpecialty, it.subSpecialty));
}
