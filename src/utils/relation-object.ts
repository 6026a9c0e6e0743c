import type { RelationObject, ScalarValue } from '../types/graph.js';

/**
 * Kontroluje, zda hodnota je podporovaný skalár (string, konečné číslo, boolean, platné datum).
 */
export function isScalarValue(value: unknown): value is ScalarValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Stabilní klíč hodnoty pro porovnání a deduplikaci.
 * Typ je součástí klíče, takže "5000" a 5000 jsou různé hodnoty.
 */
export function scalarKey(value: ScalarValue): string {
  if (value instanceof Date) return `d:${value.toISOString()}`;
  switch (typeof value) {
    case 'string':
      return `s:${value}`;
    case 'number':
      return `n:${value}`;
    default:
      return `b:${value}`;
  }
}

/**
 * Klíč objektu relace: entita vs. literál.
 */
export function objectKey(object: RelationObject): string {
  return object.type === 'entity' ? `e:${object.id}` : `l:${scalarKey(object.value)}`;
}

/** Kopie skaláru (Date je mutabilní). */
export function cloneScalar(value: ScalarValue): ScalarValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

/** Kopie objektu relace. */
export function cloneObject(object: RelationObject): RelationObject {
  return object.type === 'entity'
    ? { type: 'entity', id: object.id }
    : { type: 'literal', value: cloneScalar(object.value) };
}

/** Porovná dva objekty relace podle hodnoty. */
export function sameObject(a: RelationObject, b: RelationObject): boolean {
  return objectKey(a) === objectKey(b);
}

/**
 * Lidsky čitelná podoba skaláru (pro prompt a CLI výstup).
 */
export function formatScalar(value: ScalarValue): string {
  if (value instanceof Date) {
    // Půlnoc UTC se vypisuje jen jako datum
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

/**
 * Lidsky čitelná podoba objektu relace: entita jako `<id>`, literál dle typu.
 */
export function formatObject(object: RelationObject): string {
  return object.type === 'entity' ? `<${object.id}>` : formatScalar(object.value);
}
