/**
 * JSON Schema validation using Ajv
 */

import AjvModule from 'ajv'
import addFormatsModule from 'ajv-formats'
import type { AnySchema, ErrorObject, ValidateFunction } from 'ajv'
import { ErrorCode, JsonAssertError } from '../errors.js'
import type { JsonValue, MatchResult } from '../types.js'

const Ajv = AjvModule.default
const addFormats = addFormatsModule.default

type AjvInstance = InstanceType<typeof Ajv>

let ajvInstance: AjvInstance | null = null

function getAjv(): AjvInstance {
  if (!ajvInstance) {
    ajvInstance = new Ajv({
      allErrors: true,
      strict: false,
      validateFormats: true,
    })
    addFormats(ajvInstance)
  }
  return ajvInstance
}

export interface SchemaError {
  /** Dotted property path, `''` for the document itself */
  property: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export interface SchemaValidationResult {
  valid: boolean
  errors: SchemaError[]
}

/**
 * `/items/0/name` -> `items[0].name`
 */
export function propertyPath(instancePath: string): string {
  if (instancePath === '') return ''

  let result = ''
  for (const token of instancePath.slice(1).split('/')) {
    const key = token.replace(/~1/g, '/').replace(/~0/g, '~')
    if (/^\d+$/.test(key)) {
      result += `[${key}]`
    } else {
      result += result === '' ? key : `.${key}`
    }
  }
  return result
}

function toSchemaError(error: ErrorObject): SchemaError {
  let property = propertyPath(error.instancePath)
  const missing: unknown = error.params['missingProperty']
  if (error.keyword === 'required' && typeof missing === 'string') {
    property = property === '' ? missing : `${property}.${missing}`
  }

  return {
    property,
    message: error.message ?? 'Validation failed',
    keyword: error.keyword,
    params: error.params,
  }
}

function compileSchema(ajv: AjvInstance, schema: AnySchema): ValidateFunction {
  try {
    return ajv.compile(schema)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new JsonAssertError(`Invalid schema: ${reason}`, ErrorCode.INVALID_SCHEMA, { cause: error })
  }
}

/**
 * Validate a value against a JSON Schema
 */
export function validateSchema(value: JsonValue, schema: AnySchema): SchemaValidationResult {
  const ajv = getAjv()

  try {
    const validate = compileSchema(ajv, schema)
    if (validate(value)) {
      return { valid: true, errors: [] }
    }
    return { valid: false, errors: (validate.errors ?? []).map(toSchemaError) }
  } finally {
    // Compiled schemas are cached by object identity; drop this one
    if (typeof schema === 'object') {
      ajv.removeSchema(schema)
    }
  }
}

/**
 * `[Property: 'a.b'] must be string, [Property: 'c'] must be integer`
 */
export function formatSchemaErrors(errors: readonly SchemaError[]): string {
  return errors.map((error) => `[Property: '${error.property}'] ${error.message}`).join(', ')
}

/**
 * Match a value against a JSON Schema
 */
export function matchSchema(value: JsonValue, schema: AnySchema): MatchResult {
  const result = validateSchema(value, schema)
  if (result.valid) {
    return { passed: true }
  }
  return { passed: false, message: formatSchemaErrors(result.errors) }
}
