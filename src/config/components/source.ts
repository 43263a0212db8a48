//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from '@hapi/joi';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
const schema = joi.object({
  SOURCE_BASE_URL: joi.string()
    .uri({scheme: ['http', 'https']})
    .default('https://smart-urban-heat-map.ch/api/v2'),
  // 0 means no timeout, which is axios's default.
  SOURCE_TIMEOUT_MS: joi.number()
    .integer()
    .min(0)
    .default(30000)
}).unknown()
  .required();


//-------------------------------------------------
// Validate
//-------------------------------------------------
const {error: err, value: envVars} = schema.validate(process.env);

if (err) {
  throw new Error(`An error occured whilst validating process.env: ${err.message}`);
}


//-------------------------------------------------
// Create config object
//-------------------------------------------------
export const source: {baseUrl: string; timeoutMs: number} = {
  baseUrl: envVars.SOURCE_BASE_URL,
  timeoutMs: envVars.SOURCE_TIMEOUT_MS
};
