import {BadRequest} from '../../../errors/BadRequest';

export class InvalidTimestamp extends BadRequest {

  public constructor(message = 'Invalid timestamp') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
