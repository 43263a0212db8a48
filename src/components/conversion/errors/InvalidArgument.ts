import {BadRequest} from '../../../errors/BadRequest';

export class InvalidArgument extends BadRequest {

  public constructor(message = 'Invalid argument') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
