/**
 * Converter contract
 * @module splunk-client/converters/types
 */

/**
 * Parses wire text into a typed value
 *
 * Implementations throw `FormatError.conversionFailed` (or
 * `FormatError.unmappedEnum`) for text they cannot convert.
 */
export interface ValueConverter<T> {
  /**
   * Name of the target type, used in error messages
   */
  readonly typeName: string;

  /**
   * @param field - name of the field being converted, for diagnostics
   */
  convert(text: string, field?: string): T;
}
