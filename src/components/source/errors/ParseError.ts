import {OperationalError} from '../../../errors/OperationalError';

export class ParseError extends OperationalError {

  public privateMessage?: string;

  public constructor(message = 'Failed to parse the upstream response.', privateMessage?: string) {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.privateMessage = privateMessage;
  }

}
