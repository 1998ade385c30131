import Anthropic from '@anthropic-ai/sdk';
import { env } from './env.js';

// In test mode ANTHROPIC_API_KEY is optional and falls back to an empty string.
// Test suites mock this module, so the client is never called.
const anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY ?? '' });

export default anthropic;
