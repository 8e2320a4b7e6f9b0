// ABC notation importer
export {
  parseAbc,
  parseAbcBody,
  readAbcLines,
  stripDecorations,
  tokenizeEvents,
  foldEvents,
} from './abc';
export type { AbcLines, EventToken } from './abc';
