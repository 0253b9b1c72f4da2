import { DataFragmentError } from "../errors";

export type DataValue = string | number | boolean | DataValue[] | DataTable;

export interface DataTable {
  [key: string]: DataValue;
}

export function isDataTable(value: DataValue | undefined): value is DataTable {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert parsed YAML or JSON into a value tree. Dates become ISO strings and
 * `null` entries are dropped; functions, symbols and class instances are
 * rejected with a DataFragmentError naming the offending key path.
 */
export function toDataValue(input: unknown, origin: string, keyPath = ""): DataValue | undefined {
  if (input === null || input === undefined) return undefined;

  switch (typeof input) {
    case "string":
    case "boolean":
      return input;
    case "number":
      if (!Number.isFinite(input)) {
        throw new DataFragmentError(origin, `Non-finite number at "${keyPath}"`);
      }
      return input;
    default:
      break;
  }

  if (input instanceof Date) {
    return input.toISOString();
  }

  if (Array.isArray(input)) {
    const items: DataValue[] = [];
    input.forEach((item, index) => {
      const value = toDataValue(item, origin, `${keyPath}[${index}]`);
      if (value !== undefined) items.push(value);
    });
    return items;
  }

  if (isPlainObject(input)) {
    const table: DataTable = {};
    for (const [key, item] of Object.entries(input)) {
      const value = toDataValue(item, origin, keyPath ? `${keyPath}.${key}` : key);
      if (value !== undefined) table[key] = value;
    }
    return table;
  }

  throw new DataFragmentError(origin, `Unsupported value of type ${typeof input} at "${keyPath || "(root)"}"`);
}

export function toDataTable(input: unknown, origin: string): DataTable {
  const value = toDataValue(input ?? {}, origin);
  if (value === undefined) return {};
  if (!isDataTable(value)) {
    throw new DataFragmentError(origin, "Expected a table of key/value pairs at the top level");
  }
  return value;
}

/** Later layers win key by key; nested tables merge, arrays and scalars are replaced. */
export function mergeData(...layers: Array<DataTable | undefined>): DataTable {
  const result: DataTable = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      const existing = result[key];
      result[key] = isDataTable(existing) && isDataTable(value) ? mergeData(existing, value) : value;
    }
  }
  return result;
}
