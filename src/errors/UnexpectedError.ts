export class UnexpectedError extends Error {

  public constructor(message = 'An unexpected error occurred') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = new.target.name;
  }

}
