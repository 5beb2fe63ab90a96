import { GetSecretValueCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import type { Logger } from "pino";
import { getRegion, getSecretId } from "./env.js";
import { AppError, ConfigurationError, describeError } from "./errors.js";
import { sanitizeError } from "./logger.js";

export type DbCredentials = {
  username: string;
  password: string;
};

export interface CredentialProvider {
  getCredentials(): Promise<DbCredentials>;
}

/** Resolves a secret id to its raw `SecretString`. */
export type SecretFetcher = (secretId: string) => Promise<string | undefined>;

export function createSecretsManagerClient(): SecretsManagerClient {
  // Region is resolved on first send, so a missing REGION_NAME fails the invocation, not the cold start.
  return new SecretsManagerClient({ region: async () => getRegion() });
}

export function secretsManagerFetcher(client: SecretsManagerClient): SecretFetcher {
  return async (secretId) => {
    const output = await client.send(new GetSecretValueCommand({ SecretId: secretId }));
    return output.SecretString;
  };
}

export function parseDbCredentials(secretString: string | undefined): DbCredentials {
  if (!secretString) {
    throw new ConfigurationError("Database secret has no SecretString.");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    throw new ConfigurationError("Database secret is not valid JSON.");
  }

  if (!parsed || typeof parsed !== "object") {
    throw new ConfigurationError("Database secret must be a JSON object.");
  }

  const username = "username" in parsed && typeof parsed.username === "string" ? parsed.username : "";
  const password = "password" in parsed && typeof parsed.password === "string" ? parsed.password : "";

  if (!username || !password) {
    throw new ConfigurationError("Database secret is missing username or password.");
  }

  return { username, password };
}

export class SecretsManagerCredentialProvider implements CredentialProvider {
  constructor(
    private readonly fetchSecret: SecretFetcher,
    private readonly logger: Logger
  ) {}

  async getCredentials(): Promise<DbCredentials> {
    const secretId = getSecretId();
    this.logger.debug({ secretId }, "fetching_db_credentials");

    let secretString: string | undefined;
    try {
      secretString = await this.fetchSecret(secretId);
    } catch (error) {
      this.logger.error({ secretId, error: sanitizeError(error) }, "db_credentials_fetch_failed");
      if (error instanceof AppError) throw error;
      throw new ConfigurationError(`Failed to fetch database credentials: ${describeError(error)}`, {
        cause: error
      });
    }

    return parseDbCredentials(secretString);
  }
}
