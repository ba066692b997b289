// @kotoba-deck/data - extract stage: word lists, dictionaries and audio

export {
  type JlptCsvRow,
  parseSeq,
  jlptCsvPath,
  parseJlptCsv,
  loadJlptCsvs
} from './data/load-jlpt.js';
export {
  dictionaryWordSchema,
  jmdictSimplifiedSchema,
  parseJmdictJson,
  loadJmdictJson
} from './data/load-jmdict-json.js';
export {
  type LoadJmdictXmlOptions,
  parseEntityDeclarations,
  parseEntryXml,
  streamJmdictEntries,
  loadJmdictXml
} from './data/load-jmdict-xml.js';
export { type DictionaryFormat, detectDictionaryFormat, loadDictionary } from './data/load-dictionary.js';
export { scanAudioFolder } from './data/audio.js';
