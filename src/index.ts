export * from './game/types'
export * from './game/constants'
export * from './game/errors'
export * from './game/config'
export * from './game/logic'
export * from './game/ai/types'
export { evaluate } from './game/ai/evaluator'
export { search, bestMove } from './game/ai/search'
export * from './game/ai/strategies'
export * from './game/controller'
export * from './game/match'
export * from './game/engine'
export * from './game/benchmark'
