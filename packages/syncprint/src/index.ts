export * from './context'
export * from './errors'
export * from './format'
export * from './logger'
export * from './mutex'
export * from './print'
export * from './sink'
export * from './std'
export * from './writer'
