import { config } from 'dotenv-safe';
import { fileURLToPath } from 'url';

// Imported first by the CLI so the constants module sees the loaded values.
// Every key in .env.example must be set, though it may be empty.
config({
  allowEmptyValues: true,
  example: fileURLToPath(new URL('../.env.example', import.meta.url)),
});
