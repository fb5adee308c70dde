import { Email } from '../../../email';

export class Contact {
  readonly id: number;
  readonly name: string;
  readonly email: Email;
  readonly createdAt: Date;

  constructor(params: {
    id: number;
    name: string;
    email: Email;
    createdAt: Date;
  }) {
    this.id = params.id;
    this.name = params.name;
    this.email = params.email;
    this.createdAt = params.createdAt;
  }
}
