import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';

export class AccountIdentityService {
  private client: STSClient;

  constructor(region: string) {
    this.client = new STSClient({ region });
  }

  async getAccountId(): Promise<string> {
    const response = await this.client.send(new GetCallerIdentityCommand({}));
    if (!response.Account) {
      throw new Error('GetCallerIdentity returned no account id');
    }
    return response.Account;
  }
}
