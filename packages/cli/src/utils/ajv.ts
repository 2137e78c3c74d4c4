// pattern: Functional Core
import { Ajv } from "ajv";

// Singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  // Enable schema compilation caching
  code: { optimize: true },
  allowUnionTypes: true,
  // Report every problem, not just the first
  allErrors: true,
});

export { ajv };
