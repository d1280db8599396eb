import AjvModule, { type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";

// Both packages are CommonJS with an `exports.default`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

// For string sources such as environment variables: coerces scalars and fills
// in schema defaults
export const coercingAjv = new Ajv({
  allErrors: true,
  strict: false,
  coerceTypes: true,
  useDefaults: true,
});
addFormats(coercingAjv);

export function errorsText(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors, { separator: "; " });
}
