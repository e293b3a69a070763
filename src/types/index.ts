export * from './world'
export type * from './session'
export type * from './action'
export type * from './api'
export type * from './config'
