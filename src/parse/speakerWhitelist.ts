export type WhitelistEntry = {
  fullname: string;
  jabatan: string;
  category: string;
  /** Lower-cased, comma-separated aliases as listed in the whitelist file. */
  alias: string;
};

export const WHITELIST_COLUMNS = ['jabatan', 'category', 'alias', 'fullname'] as const;

export const NO_MATCH: Readonly<WhitelistEntry> = Object.freeze({
  fullname: '',
  jabatan: '',
  category: '',
  alias: '',
});

/**
 * Maps speaker names as the model wrote them onto known people. A speaker
 * matches an entry when one of its aliases occurs in the name or the name
 * occurs in an alias, case-insensitively; the first entry in file order wins.
 */
export class SpeakerWhitelist {
  private readonly entries: ReadonlyArray<{ entry: WhitelistEntry; aliases: string[] }>;

  constructor(entries: readonly WhitelistEntry[]) {
    this.entries = entries.map((entry) => ({
      entry,
      aliases: entry.alias
        .split(',')
        .map((alias) => alias.trim().toLowerCase())
        .filter(Boolean),
    }));
  }

  get size(): number {
    return this.entries.length;
  }

  match(speaker: string): Readonly<WhitelistEntry> {
    const spoken = speaker.trim().toLowerCase();
    if (!spoken) {
      return NO_MATCH;
    }

    const found = this.entries.find(({ aliases }) =>
      aliases.some((alias) => spoken.includes(alias) || alias.includes(spoken)),
    );
    return found ? found.entry : NO_MATCH;
  }
}
