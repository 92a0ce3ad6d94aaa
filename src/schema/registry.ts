/**
 * Subclass registry for open polymorphic bases.
 *
 * @packageDocumentation
 */

import { MissingTypeException } from '../diagnostics/errors.js';
import type { OpenBase, RecordShape } from './types.js';

/**
 * Creates a new open base identity.
 *
 * @param name - Display name used in diagnostics.
 * @returns A frozen base identity; compare by reference.
 *
 * @example
 * ```typescript
 * interface InputSource { describe(): string }
 * const InputSource = defineBase<InputSource>('InputSource');
 * ```
 */
export function defineBase<T>(name: string): OpenBase<T> {
  return Object.freeze({ name });
}

/**
 * Maps each open base to its registered concrete record shapes, in
 * registration order.
 *
 * Candidate lists are frozen arrays replaced on every registration, so a list
 * returned by {@link SubclassRegistry.candidates} never changes under a decode
 * that is iterating it.
 */
export class SubclassRegistry {
  private readonly entries = new Map<OpenBase<unknown>, readonly RecordShape<unknown>[]>();

  /**
   * Registers a concrete candidate for a base.
   *
   * Registering the same shape twice is a no-op.
   *
   * @param base - The open base.
   * @param candidate - The concrete record shape.
   * @throws MissingTypeException if another candidate of the same base already
   * uses the candidate's name, since `_type` could not tell them apart.
   */
  register(base: OpenBase<unknown>, candidate: RecordShape<unknown>): void {
    const current = this.entries.get(base) ?? [];
    if (current.includes(candidate)) {
      return;
    }
    if (current.some((existing) => existing.name === candidate.name)) {
      throw new MissingTypeException(
        `subtype name '${candidate.name}' is already registered for ${base.name}`,
        ''
      );
    }
    this.entries.set(base, Object.freeze([...current, candidate]));
  }

  /**
   * Returns a snapshot of the candidates registered for a base.
   *
   * @param base - The open base.
   * @returns Candidates in registration order; empty when none are registered.
   */
  candidates(base: OpenBase<unknown>): readonly RecordShape<unknown>[] {
    return this.entries.get(base) ?? [];
  }
}

/**
 * Process-wide registry. Records declared with `extends` register here.
 */
export const defaultRegistry = new SubclassRegistry();
