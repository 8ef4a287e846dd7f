/**
 * Lightweight Schema Validation
 *
 * Design decisions:
 * - Precompiled validation functions — schemas are compiled once per factory
 * - Schema defined as plain objects — no DSL overhead
 * - Returns errors array or null — no error objects created on success
 * - Used for converter keyword arguments and route manifests
 * - No external dependencies
 */

export interface SchemaField {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'array';
  required?: boolean;
  /** Accept an explicit null as "not given" */
  nullable?: boolean;
  min?: number;
  minLength?: number;
}

export type Schema = Record<string, SchemaField>;
export type ValidatorFn = (data: Readonly<Record<string, unknown>>) => string[] | null;

type FieldChecker = (val: unknown) => string | null;

/**
 * Compile a schema into a validation function
 */
export function compileSchema(schema: Schema): ValidatorFn {
  const validators: ((data: Readonly<Record<string, unknown>>) => string | null)[] = [];

  for (const [name, rules] of Object.entries(schema)) {
    validators.push(compileField(name, rules));
  }

  return function validate(data: Readonly<Record<string, unknown>>): string[] | null {
    if (!data || typeof data !== 'object' || Array.isArray(data)) {
      return ['Expected an object'];
    }

    let errors: string[] | null = null;

    for (let i = 0; i < validators.length; i++) {
      const err = validators[i](data);
      if (err) {
        if (!errors) errors = [];
        errors.push(err);
      }
    }

    return errors;
  };
}

function isAbsent(val: unknown): boolean {
  return val === undefined || val === null;
}

function compileField(
  name: string,
  rules: SchemaField
): (data: Readonly<Record<string, unknown>>) => string | null {
  const checks: FieldChecker[] = [];

  if (rules.required) {
    checks.push((val) => {
      if (val === undefined || val === '' || (val === null && !rules.nullable)) {
        return `${name} is required`;
      }
      return null;
    });
  } else if (!rules.nullable) {
    checks.push((val) => (val === null ? `${name} must not be null` : null));
  }

  switch (rules.type) {
    case 'string':
      checks.push((val) => (!isAbsent(val) && typeof val !== 'string' ? `${name} must be a string` : null));
      break;
    case 'number':
      checks.push((val) => (!isAbsent(val) && typeof val !== 'number' ? `${name} must be a number` : null));
      break;
    case 'integer':
      checks.push((val) =>
        !isAbsent(val) && (typeof val !== 'number' || !Number.isInteger(val))
          ? `${name} must be an integer`
          : null
      );
      break;
    case 'boolean':
      checks.push((val) => (!isAbsent(val) && typeof val !== 'boolean' ? `${name} must be a boolean` : null));
      break;
    case 'array':
      checks.push((val) => (!isAbsent(val) && !Array.isArray(val) ? `${name} must be an array` : null));
      break;
    case undefined:
      break;
  }

  if (rules.min !== undefined) {
    const min = rules.min;
    checks.push((val) => (typeof val === 'number' && val < min ? `${name} must be >= ${min}` : null));
  }
  if (rules.minLength !== undefined) {
    const minLen = rules.minLength;
    checks.push((val) =>
      typeof val === 'string' && val.length < minLen ? `${name} must have at least ${minLen} characters` : null
    );
  }

  return function validateField(data: Readonly<Record<string, unknown>>): string | null {
    const val = data[name];
    for (let i = 0; i < checks.length; i++) {
      const err = checks[i](val);
      if (err) return err;
    }
    return null;
  };
}
