export { locate, searchRules, isRemoteLocation, type LocateOptions } from './locator.js'
