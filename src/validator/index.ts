export { validateStrict, assertStrict, type StrictResult } from './strict.js'
