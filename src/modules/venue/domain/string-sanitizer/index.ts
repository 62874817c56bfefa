export { cleanInputString, isReplacedControl } from './clean-input-string';
export { MAX_STRING_LENGTH } from './constants';
export { countCodePoints, trimWhiteSpace, truncateCodePoints } from './text-bounds';
export { hasUnpairedSurrogate, toUtf8Bytes, utf8SequenceLength } from './utf8';
