export type Language = {
  key: string;
  name: string;
};

/**
 * Languages installed on this server. Profiles for any other language are
 * stored but never served.
 */
export class Languages {
  private readonly byKey: ReadonlyMap<string, Language>;

  constructor(languages: readonly Language[]) {
    this.byKey = new Map(languages.map((l) => [l.key, { ...l }]));
  }

  keys(): string[] {
    return Array.from(this.byKey.keys());
  }

  get(key: string): Language | null {
    return this.byKey.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }
}
