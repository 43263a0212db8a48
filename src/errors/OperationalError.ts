// Errors we anticipate and can describe to the caller, as opposed to programmer errors.
export class OperationalError extends Error {

  public constructor(message = 'Operational error') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = new.target.name;
  }

}
