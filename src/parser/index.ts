export {
  parseAll,
  parseTag,
  isValidTag,
  removeTags,
  parseContainerTags,
  parseSelfClosing,
  parseNamespaced,
} from './parser.js';
export { splitArgs, classifyArgs, parseArgs } from './args.js';
export { isIdentifier, isHookName, describeIdentifierProblem, hasReservedSentinel } from './identifiers.js';

export type { Tag, TagKind, SingleTag, ContainerTag, NamespacedTag, ParseOptions } from './types.js';
export type { ClassifiedArgs } from './args.js';
