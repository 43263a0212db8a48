//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from '@hapi/joi';
import {LoggerFormat, LoggerLevel} from '../../utils/logger';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
const schema = joi.object({
  LOGGER_LEVEL: joi.string()
    .valid('silent', 'trace', 'debug', 'info', 'warn', 'error', 'fatal')
    .default('info'),
  LOGGER_FORMAT: joi.string()
    .valid('json', 'terminal')
    .default('json')
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
export const logger: {level: LoggerLevel; format: LoggerFormat} = {
  level: envVars.LOGGER_LEVEL,
  format: envVars.LOGGER_FORMAT
};
