import {OperationalError} from '../../../errors/OperationalError';

export class TransportError extends OperationalError {

  public statusCode?: number;
  public privateMessage?: string;

  public constructor(message = 'Failed to retrieve data from the upstream API.', statusCode?: number, privateMessage?: string) {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.statusCode = statusCode;
    // Add a private message, which can for logged for extra detail, but should not be sent to the client.
    this.privateMessage = privateMessage;
  }

}
