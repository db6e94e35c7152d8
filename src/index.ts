/**
 * State-based CRDTs on Effect STM.
 *
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * as CRDT from "./CRDT.js"

/**
 * @since 0.1.0
 */
export * as CRDTCounter from "./CRDTCounter.js"

/**
 * @since 0.1.0
 */
export * as CRDTSet from "./CRDTSet.js"

/**
 * @since 0.1.0
 */
export * as GCounter from "./GCounter.js"

/**
 * @since 0.1.0
 */
export * as PNCounter from "./PNCounter.js"

/**
 * @since 0.1.0
 */
export * as GSet from "./GSet.js"

/**
 * @since 0.1.0
 */
export * as TwoPSet from "./TwoPSet.js"

/**
 * @since 0.1.0
 */
export * as ORSet from "./ORSet.js"
