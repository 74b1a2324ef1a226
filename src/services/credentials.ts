/** Yes/no signal for whether the engine has a credential worth using. */
export interface CredentialProvider {
  hasUsableCredential(): boolean | Promise<boolean>;
}

export class StaticCredentialProvider implements CredentialProvider {
  private readonly accessToken: string;

  private readonly pageId: string;

  private readonly mock: boolean;

  constructor(options: { accessToken: string; pageId: string; mock?: boolean }) {
    this.accessToken = options.accessToken.trim();
    this.pageId = options.pageId.trim();
    this.mock = options.mock ?? false;
  }

  hasUsableCredential(): boolean {
    if (this.mock) return true;
    return this.accessToken.length > 0 && this.pageId.length > 0;
  }
}
