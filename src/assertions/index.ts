/**
 * Assertions module - main entry point
 */

export { containsJson, looseScalarEquals } from './contains.js'

export {
  FORMAT_VALIDATORS,
  JsonTypeFilters,
  compileFilter,
  hasNestedQuantifier,
  parseDelimitedRegex,
  type CompiledFilter,
  type FilterFunction,
} from './filters.js'

export {
  JSON_TYPE_NAMES,
  compileJsonType,
  parseTypePattern,
  splitPattern,
  type CompiledJsonType,
  type CompiledTypePattern,
  type CompiledTypeShape,
  type TypeAlternative,
} from './json-type-parser.js'

export { dontMatchJsonType, matchesJsonType, typeOfJson, type JsonTypeOptions } from './json-type.js'

export {
  parseJsonPath,
  queryJsonPath,
  type Comparable,
  type ComparisonOperator,
  type FilterExpression,
  type PathQuery,
  type Segment,
  type Selector,
} from './jsonpath.js'

export {
  TYPE_ATTRIBUTE,
  isValidTagName,
  leafText,
  projectJson,
  serializeTree,
  type JsonTree,
  type LeafType,
  type ProjectionOptions,
} from './projection.js'

export { JsonResponseAssertions } from './response.js'

export {
  formatSchemaErrors,
  matchSchema,
  propertyPath,
  validateSchema,
  type SchemaError,
  type SchemaValidationResult,
} from './schema.js'

export { evaluateXPath, expandNumberLiterals, filterByXPath, textOfNodes } from './xpath.js'
