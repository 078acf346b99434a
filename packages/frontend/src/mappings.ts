/**
 * Deobfuscation mappings
 *
 * Original (obfuscated) names to friendly names, as recorded by a mapping
 * database. Member entries may be keyed "Type.Member" or by the bare
 * member name; the qualified key wins.
 */

export type NameMappingEntry = {
  readonly obfuscatedName: string;
  readonly friendlyName: string;
};

export type NameMappings = {
  readonly entries: ReadonlyMap<string, string>;
};

export const EMPTY_MAPPINGS: NameMappings = { entries: new Map() };

/**
 * Later entries for the same original name replace earlier ones.
 */
export const createNameMappings = (
  entries: readonly NameMappingEntry[]
): NameMappings => ({
  entries: new Map(
    entries.map((entry) => [entry.obfuscatedName, entry.friendlyName])
  ),
});

export const friendlyName = (
  mappings: NameMappings,
  name: string
): string | undefined => mappings.entries.get(name);

export const friendlyMemberName = (
  mappings: NameMappings,
  typeName: string,
  memberName: string
): string | undefined =>
  mappings.entries.get(`${typeName}.${memberName}`) ??
  mappings.entries.get(memberName);
