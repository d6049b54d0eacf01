export { parseCliOptions, parseTemplateVariables, toPipelineOptions } from './cli-parser';
export { parseEnvironment, pricingFromEnv } from './env-parser';
export { validateApiResponse, validateAnthropicResponse } from './api-client';
