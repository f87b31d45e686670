/**
 * Uniform field lookup across the metadata shapes the handlers produce.
 *
 * A parsed distribution object exposes fields as named properties
 * (`author_email`), a header block exposes them through `get`/`getAll`
 * (`Author-email`), and a literal mapping such as setup() keyword arguments
 * does both. Callers ask for the logical field name and never branch on shape.
 */
export interface MetadataSource {
  /** Named property lookup. */
  field?(name: string): unknown;
  /** Single-valued accessor lookup. */
  get?(name: string): unknown;
  /** Multi-valued accessor lookup. */
  getAll?(name: string): unknown[] | undefined;
  /** Free-text body following the fields, where the format has one. */
  getPayload?(): string;
}

export function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstPresent(...lookups: Array<() => unknown>): unknown {
  for (const lookup of lookups) {
    const value = lookup();
    if (isPresent(value)) return value;
  }
  return undefined;
}

function fieldLookup(source: MetadataSource, name: string): unknown {
  if (!source.field) return undefined;
  const attrName = name.replace(/-/g, '_');
  return firstPresent(
    () => source.field?.(attrName),
    () => source.field?.(attrName.toLowerCase())
  );
}

function getLookup(source: MetadataSource, name: string): unknown {
  if (!source.get) return undefined;
  return firstPresent(
    () => source.get?.(name),
    () => source.get?.(name.toLowerCase())
  );
}

function getAllLookup(source: MetadataSource, name: string): unknown {
  if (!source.getAll) return undefined;
  return firstPresent(
    () => source.getAll?.(name),
    () => source.getAll?.(name.toLowerCase())
  );
}

/**
 * Return the value of the field `name`, or undefined when it is missing or
 * empty. With `multiple`, the result is always an array (possibly empty).
 */
export function getAttribute(source: MetadataSource, name: string, multiple: true): unknown[];
export function getAttribute(source: MetadataSource, name: string, multiple?: false): unknown;
export function getAttribute(source: MetadataSource, name: string, multiple = false): unknown {
  if (!multiple) {
    return firstPresent(
      () => fieldLookup(source, name),
      () => getLookup(source, name)
    );
  }
  const value = firstPresent(
    () => fieldLookup(source, name),
    () => getAllLookup(source, name),
    () => getLookup(source, name)
  );
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function getString(source: MetadataSource, name: string): string | undefined {
  const value = getAttribute(source, name);
  return typeof value === 'string' ? value : undefined;
}

export function getStrings(source: MetadataSource, name: string): string[] {
  return getAttribute(source, name, true).filter((value): value is string => typeof value === 'string');
}

/**
 * Wrap a plain key/value mapping. Its keys are reachable both as named fields
 * and through `get`, so `Author-email` finds an `author_email` key.
 */
export function fromMapping(mapping: Record<string, unknown>): MetadataSource {
  const lookup = (name: string): unknown =>
    Object.prototype.hasOwnProperty.call(mapping, name) ? mapping[name] : undefined;
  return { field: lookup, get: lookup };
}

/**
 * Wrap an object whose fields are plain properties, such as a distribution
 * object a library caller already parsed. Methods are not fields.
 */
export function fromObject(target: object): MetadataSource {
  return {
    field(name: string): unknown {
      if (!(name in target)) return undefined;
      const value: unknown = Reflect.get(target, name);
      return typeof value === 'function' ? undefined : value;
    }
  };
}
