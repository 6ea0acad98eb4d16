export {
  type FieldValue,
  type FieldKind,
  classifyField,
  formatFieldValue,
  isPlainMap,
  renderFieldValue,
  sortedKeys,
  withSortedKeys,
} from "./field-value.js";
