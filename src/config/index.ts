// Load any environmental variables set in the .env file into process.env
import * as dotenv from 'dotenv';
dotenv.config();

// Retrieve each of our configuration components
import * as logger from './components/logger';
import * as source from './components/source';


// Export
export const config = Object.assign({}, logger, source);
