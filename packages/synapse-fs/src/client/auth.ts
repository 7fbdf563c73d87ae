import { AUTH_TOKEN_SECRET_NAME, type Config } from '@/config';
import { SynapseFsError } from '@/errors';
import { getLogger } from '@/telemetry/logger';

/** Host-provided secret store, consulted after an explicit token and before the environment. */
export interface SecretsProvider {
  getSecret(name: string): Promise<string | undefined>;
}

export interface SynapseAuthManagerOptions {
  secrets?: SecretsProvider;
  env?: NodeJS.ProcessEnv;
}

const logger = () => getLogger('Auth');

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export class SynapseAuthManager {
  private readonly secrets?: SecretsProvider;

  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly config: Pick<Config, 'authToken'>,
    options: SynapseAuthManagerOptions = {}
  ) {
    this.secrets = options.secrets;
    this.env = options.env ?? process.env;
  }

  private async findToken(): Promise<string | undefined> {
    const explicit = nonEmpty(this.config.authToken);
    if (explicit) {
      return explicit;
    }

    if (this.secrets) {
      try {
        const secret = nonEmpty(await this.secrets.getSecret(AUTH_TOKEN_SECRET_NAME));
        if (secret) {
          return secret;
        }
      } catch (error) {
        logger().warn({ err: error }, 'Secret store lookup failed, falling back to environment');
      }
    }

    return nonEmpty(this.env[AUTH_TOKEN_SECRET_NAME]);
  }

  async getAuthToken(): Promise<string> {
    const token = await this.findToken();
    if (!token) {
      throw new SynapseFsError(
        `Synapse auth token not configured. Pass authToken, store the ${AUTH_TOKEN_SECRET_NAME} secret, ` +
          `or set the ${AUTH_TOKEN_SECRET_NAME} environment variable.`,
        'AUTH_NOT_CONFIGURED'
      );
    }
    return token;
  }

  async authorizationHeader(): Promise<string> {
    return `Bearer ${await this.getAuthToken()}`;
  }

  async isConfigured(): Promise<boolean> {
    return (await this.findToken()) !== undefined;
  }
}
