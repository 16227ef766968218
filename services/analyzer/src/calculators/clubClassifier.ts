/**
 * Club name classification by case-insensitive substring rules.
 * First matching rule wins.
 */

const WOOD_TOKENS = ["wood", "fw", "3w", "5w"];
const HYBRID_TOKENS = ["hybrid", "rescue", "híbrido"];
const WEDGE_TOKENS = ["wedge", "gw", "sw", "lw"];

const includesAny = (name: string, tokens: readonly string[]) => tokens.some((token) => name.includes(token));

export const TARGET_SMASH = {
  driver: 1.48,
  wood: 1.47,
  hybrid: 1.45,
  wedge: 1.25,
  iron: 1.33,
} as const;

/**
 * Ideal smash factor for a club
 */
export function clubTargetSmash(clubName: string): number {
  const name = clubName.toLowerCase();

  if (name.includes("driver")) return TARGET_SMASH.driver;
  if (includesAny(name, WOOD_TOKENS)) return TARGET_SMASH.wood;
  if (includesAny(name, HYBRID_TOKENS)) return TARGET_SMASH.hybrid;
  if (includesAny(name, WEDGE_TOKENS)) return TARGET_SMASH.wedge;

  // irons and anything unmatched
  return TARGET_SMASH.iron;
}

/**
 * Bag order: driver, then numbered clubs by their first number, then wedges, then the rest.
 * A number wins over a wedge keyword ("56 SW" ranks 156).
 */
export function clubSortRank(clubName: string): number {
  const name = clubName.toLowerCase();

  if (name.includes("driver")) return 1;

  const digits = name.match(/\d+/);
  if (digits) return 100 + parseInt(digits[0], 10);

  if (includesAny(name, WEDGE_TOKENS)) return 200;

  return 300;
}

/**
 * Distinct club names in bag order; ties keep first-seen order.
 */
export function sortClubs(clubNames: Iterable<string>): string[] {
  const distinct = Array.from(new Set(clubNames));
  return distinct
    .map((club, index) => ({ club, index, rank: clubSortRank(club) }))
    .sort((a, b) => a.rank - b.rank || a.index - b.index)
    .map((entry) => entry.club);
}
