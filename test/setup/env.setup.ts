/**
 * Runs before each test file is imported
 */
import 'reflect-metadata';

for (const name of Object.keys(process.env)) {
  if (name.startsWith('AHASEND_')) {
    delete process.env[name];
  }
}
