/**
 * Two-phase name lookup used for users, channels and project boards.
 *
 * Every candidate is checked for a case-insensitive exact match before any
 * substring match is considered, so an exact hit later in the list beats a
 * fuzzy hit earlier. Within a phase the first candidate in iteration order
 * wins. Returns null when nothing matches.
 */
export function matchByName<T>(
  candidates: Iterable<T>,
  query: string,
  names: (candidate: T) => Array<string | undefined>
): T | null {
  const needle = query.trim().toLowerCase();
  if (!needle) return null;

  const list = Array.from(candidates);
  const variants = (candidate: T) =>
    names(candidate)
      .filter((name): name is string => Boolean(name))
      .map((name) => name.toLowerCase());

  const exact = list.find((candidate) => variants(candidate).includes(needle));
  if (exact !== undefined) return exact;

  const fuzzy = list.find((candidate) => variants(candidate).some((name) => name.includes(needle)));
  return fuzzy ?? null;
}
