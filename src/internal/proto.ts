/**
 * Shared Proto object utilities for CRDTs.
 *
 * Provides common implementations of the Inspectable and Pipeable protocols
 * to reduce duplication across CRDT implementations.
 *
 * @since 0.1.0
 * @internal
 */

import { format, NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"
import * as Predicate from "effect/Predicate"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import { CRDTTypeId } from "../CRDT.js"

/**
 * Common CRDT interface for Proto implementations.
 * @internal
 */
export interface CRDTWithState<S> {
  readonly stateRef: TRef.TRef<S>
}

/**
 * Type guard to check if a value has the CRDT type ID.
 *
 * @internal
 */
export const isCRDT = (u: unknown): u is { readonly [CRDTTypeId]: typeof CRDTTypeId } =>
  Predicate.hasProperty(u, CRDTTypeId)

/**
 * Creates common Proto object methods for CRDTs.
 *
 * Inspection prints the label of the CRDT only: its state lives in a `TRef`
 * and can be observed inside a transaction via `query`.
 *
 * @internal
 */
export const makeProtoBase = (label: string) => ({
  [CRDTTypeId]: CRDTTypeId,
  toJSON() {
    return { _id: label }
  },
  [NodeInspectSymbol]() {
    return format(this)
  },
  toString() {
    return format(this)
  },
  pipe() {
    return pipeArguments(this, arguments)
  }
})

/**
 * Replaces the state of a CRDT with the result of a transition that may fail.
 *
 * When the transition fails nothing is written, so the receiver keeps the
 * state it had before the operation.
 *
 * @internal
 */
export const transition = <S, E>(
  self: CRDTWithState<S>,
  f: (state: S) => STM.STM<S, E>
): STM.STM<void, E> =>
  TRef.get(self.stateRef).pipe(
    STM.flatMap(f),
    STM.flatMap((next) => TRef.set(self.stateRef, next))
  )
