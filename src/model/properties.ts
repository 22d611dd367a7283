import type { PropertySet, PropertyValue } from './schema.js';

interface HasPropertySets {
  propertySets?: PropertySet[];
}

/**
 * Split a "PropertySet.Property" path. Property names may contain dots or
 * spaces ("PSet_Revit_Constraints.Sill Height"), so only the first dot counts.
 */
export function splitPropertyPath(path: string): { set: string; property: string } {
  const dot = path.indexOf('.');
  if (dot <= 0 || dot === path.length - 1) {
    throw new Error(`Invalid property path "${path}" (expected "PropertySet.Property")`);
  }
  return { set: path.slice(0, dot), property: path.slice(dot + 1) };
}

export function getPropertyValue(element: HasPropertySets, path: string): PropertyValue | undefined {
  const { set, property } = splitPropertyPath(path);
  for (const pset of element.propertySets ?? []) {
    if (pset.name === set && Object.prototype.hasOwnProperty.call(pset.properties, property)) {
      return pset.properties[property];
    }
  }
  return undefined;
}

/** Numeric property value, or undefined when absent or not a number */
export function getNumericProperty(element: HasPropertySets, path: string): number | undefined {
  const value = getPropertyValue(element, path);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Look up a boolean property by name in any property set.
 * Returns undefined when no set carries it.
 */
export function findBooleanProperty(element: HasPropertySets, name: string): boolean | undefined {
  for (const pset of element.propertySets ?? []) {
    const value = pset.properties[name];
    if (typeof value === 'boolean') {
      return value;
    }
  }
  return undefined;
}
