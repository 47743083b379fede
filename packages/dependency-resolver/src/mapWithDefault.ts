export class MapWithDefault<K, T> {
  readonly map = new Map<K, T>();

  constructor(private readonly defaultCreator: () => T) {}

  get(key: K): T {
    let value = this.map.get(key);
    if (value === undefined) {
      value = this.defaultCreator();
      this.map.set(key, value);
    }
    return value;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }
}
