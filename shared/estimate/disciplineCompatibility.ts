import type { EstimatingDictionary } from "./schema";
import { eitherContains, normalizeText } from "./textNormalizer";

/**
 * Whether a KB entry recorded under `kbDiscipline` may price an item of
 * `itemDiscipline`. Incompatible entries are not scored at all.
 */
export function isDisciplineCompatible(
  kbDiscipline: string | null | undefined,
  itemDiscipline: string | null | undefined,
  dictionary: EstimatingDictionary
): boolean {
  const kb = normalizeText(kbDiscipline);
  const item = normalizeText(itemDiscipline);

  if (!kb || !item) return true;
  if (kb === item) return true;
  if (dictionary.wildcardDisciplines.some((w) => normalizeText(w) === kb)) return true;
  if (eitherContains(kb, item)) return true;

  return dictionary.disciplineAliases.some(({ short, full }) => {
    const s = normalizeText(short);
    const f = normalizeText(full);
    return (kb === s && item === f) || (kb === f && item === s);
  });
}
