export class ContactAlreadyExistsException extends Error {
  constructor(email: string) {
    super(`Contact with email '${email}' already exists`);
    this.name = 'ContactAlreadyExistsException';
  }
}
