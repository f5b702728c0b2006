/**
 * Centralized Type Definitions
 *
 * Interfaces, error constants and Safe helpers shared by the engine
 * and its capability providers.
 */

export * from './engine'
export * from './errors'
export * from './safe'
