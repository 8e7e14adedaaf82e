export { valuesEqual, compareValues, containsText } from './compare.js';
export { isPlainObject, toFieldMap } from './records.js';
