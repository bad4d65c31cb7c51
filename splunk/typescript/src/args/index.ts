/**
 * Argument serialization
 * @module splunk-client/args
 */

export { Argument, toSearchParams } from './argument.js';
export { ArgTypes, type ArgKind, type ArgType } from './types.js';
export {
  compareParameters,
  parameter,
  type Parameter,
  type ParameterDeclaration,
  type ParameterOptions,
} from './parameter.js';
export { ArgsSchema, defineArgs, NO_ARGUMENTS, type ArgsTable } from './schema.js';
