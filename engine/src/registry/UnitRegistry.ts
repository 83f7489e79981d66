/**
 * Unit Registry
 *
 * Catalog of invocable units. Specs are frozen on registration; the only
 * mutations are register and unregister, both expected at startup.
 *
 * @module registry
 */

import { RegistryError } from '../errors/index.js';
import type { Unit, UnitSpec, UnitSpecInput } from '../types/core-types.js';

export const DEFAULT_UNIT_TIMEOUT_MS = 120_000;
export const DEFAULT_UNIT_MAX_RETRIES = 2;

const UNIT_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

export interface RegisteredUnit {
  readonly spec: UnitSpec;
  readonly unit: Unit;
}

export class UnitRegistry {
  private units: Map<string, RegisteredUnit> = new Map();

  /**
   * Register a unit
   *
   * @throws {RegistryError} duplicate name or invalid spec
   */
  register(input: UnitSpecInput, unit: Unit): UnitSpec {
    if (this.units.has(input.name)) {
      throw RegistryError.duplicateName(input.name);
    }

    const spec = normalizeSpec(input);
    this.units.set(spec.name, { spec, unit });
    return spec;
  }

  unregister(name: string): boolean {
    return this.units.delete(name);
  }

  /**
   * @throws {RegistryError} when no unit has this name
   */
  lookup(name: string): UnitSpec {
    return this.entry(name).spec;
  }

  /**
   * Spec and implementation together
   *
   * @throws {RegistryError} when no unit has this name
   */
  entry(name: string): RegisteredUnit {
    const entry = this.units.get(name);
    if (!entry) {
      throw RegistryError.notFound(name, this.names());
    }
    return entry;
  }

  has(name: string): boolean {
    return this.units.has(name);
  }

  /**
   * Names in registration order
   */
  names(): string[] {
    return Array.from(this.units.keys());
  }

  specs(): UnitSpec[] {
    return Array.from(this.units.values(), (entry) => entry.spec);
  }

  get size(): number {
    return this.units.size;
  }

  /**
   * Units with at least one keyword found in the text (substring match,
   * ignoring case and accents), in registration order
   */
  candidatesForKeywords(text: string): Set<string> {
    const haystack = foldText(text);
    const matched = new Set<string>();

    for (const { spec } of this.units.values()) {
      for (const keyword of spec.keywords) {
        if (haystack.includes(foldText(keyword))) {
          matched.add(spec.name);
          break;
        }
      }
    }

    return matched;
  }
}

/**
 * Lowercase and strip combining marks, so "Sécurité" matches "securite"
 */
export function foldText(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

function normalizeSpec(input: UnitSpecInput): UnitSpec {
  if (!UNIT_NAME_PATTERN.test(input.name)) {
    throw RegistryError.invalidSpec(
      input.name,
      'names must start with a letter or digit and contain only letters, digits, ".", "_" or "-"'
    );
  }

  const timeoutMs = input.timeoutMs ?? DEFAULT_UNIT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw RegistryError.invalidSpec(input.name, `timeoutMs must be a positive number, got ${timeoutMs}`);
  }

  const maxRetries = input.maxRetries ?? DEFAULT_UNIT_MAX_RETRIES;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw RegistryError.invalidSpec(input.name, `maxRetries must be a non-negative integer, got ${maxRetries}`);
  }

  const fallback = [...(input.fallback ?? [])];
  if (fallback.includes(input.name)) {
    throw RegistryError.invalidSpec(input.name, 'a unit cannot be its own fallback');
  }

  const keywords = new Set<string>();
  for (const keyword of input.keywords ?? []) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized) {
      keywords.add(normalized);
    }
  }

  return Object.freeze({
    name: input.name,
    description: input.description ?? '',
    team: input.team,
    keywords: Object.freeze([...keywords]),
    fallback: Object.freeze(fallback),
    timeoutMs,
    maxRetries,
  });
}
