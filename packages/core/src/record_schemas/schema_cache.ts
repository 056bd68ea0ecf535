import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 * Every stored value is checked on read, so validators are compiled once per schema.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed JSON)
   * @returns Compiled AJV validator function
   */
  static getValidatorFromSchema<T = unknown>(schema: SchemaObject): ValidateFunction<T> {
    // Create a stable key from the schema object
    const schemaKey = JSON.stringify(schema);

    let validator = this.schemaValidators.get(schemaKey);
    if (!validator) {
      if (!this.ajv) {
        this.ajv = new Ajv({ allErrors: true });
      }

      // $id is dropped so that recompiling after clearCache() never collides
      const { $id: _id, ...schemaWithoutId } = schema;

      validator = this.ajv.compile(schemaWithoutId);
      this.schemaValidators.set(schemaKey, validator);
    }

    return validator as ValidateFunction<T>;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.schemaValidators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number } {
    return {
      cachedSchemas: this.schemaValidators.size,
    };
  }
}
