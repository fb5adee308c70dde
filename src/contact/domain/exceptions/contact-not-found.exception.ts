export class ContactNotFoundException extends Error {
  constructor(email: string) {
    super(`Contact with email '${email}' not found`);
    this.name = 'ContactNotFoundException';
  }
}
