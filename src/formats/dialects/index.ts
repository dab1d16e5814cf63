export { tomlFormat } from './toml.js'
export { yamlFormat } from './yaml.js'
export { jsonFormat, json5Format, jsoncFormat, hjsonFormat } from './json.js'
export { iniFormat, parseIni, DEFAULT_SECTION } from './ini.js'
export { xmlFormat } from './xml.js'
