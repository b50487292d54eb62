/**
 * Schema Validation Script
 * Checks that every record schema compiles under the shared ajv instance
 *
 * Usage: npx tsx scripts/validate_schemas.ts
 */

import { getScanValidator, getSpotValidator } from '../src/validation/ajv_instance';
import { loadSchema, type SchemaName } from '../src/validation/schema_loader';

console.log('Validating schemas...\n');

const compilers: Record<SchemaName, () => unknown> = {
  'scan.v1': getScanValidator,
  'spot.v1': getSpotValidator,
};

let hasErrors = false;

for (const name of ['scan.v1', 'spot.v1'] as const) {
  try {
    const schema = loadSchema(name);
    compilers[name]();
    console.log(`✓ ${name}`);
    console.log(`  ID: ${schema.$id}`);
    console.log(`  Required: ${schema.required?.join(', ') || 'none'}`);
    console.log('');
  } catch (error) {
    hasErrors = true;
    console.log(`✗ ${name}`);
    console.log(`  Error: ${error instanceof Error ? error.message : String(error)}`);
    console.log('');
  }
}

if (hasErrors) {
  console.log('\nSchema validation FAILED');
  process.exit(1);
} else {
  console.log('All schemas validated successfully');
}
