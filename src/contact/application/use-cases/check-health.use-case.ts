import { Injectable, Inject } from '@nestjs/common';
import { IContactRepository } from '../interfaces/contact-repository.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface HealthStatus {
  database: boolean;
}

@Injectable()
export class CheckHealthUseCase {
  constructor(
    @Inject(INJECTION_TOKENS.CONTACT_REPOSITORY)
    private readonly contacts: IContactRepository,
  ) {}

  async execute(): Promise<HealthStatus> {
    const database = await this.contacts.isHealthy();
    return { database };
  }
}
