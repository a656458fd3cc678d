import { readFile, writeFile } from "fs/promises";
import { OAuth2Client, type Credentials } from "google-auth-library";
import { AuthUnavailableError, err, errorMessage, ok, type Result } from "../../domain/errors/job.errors";
import type { ICredentialProvider } from "../../domain/interfaces/ivideo.platform";

export const YOUTUBE_UPLOAD_SCOPE = "https://www.googleapis.com/auth/youtube.upload";

export interface GoogleOAuthCredentialProviderOptions {
  clientSecretsFile: string;
  tokenFile: string;
}

interface ClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Client secrets as downloaded from the Google Cloud console: an `installed` or `web`
 * object holding `client_id`, `client_secret` and `redirect_uris`.
 */
export function parseClientSecrets(raw: unknown): ClientSecrets | null {
  if (!isRecord(raw)) return null;
  const section = isRecord(raw.installed) ? raw.installed : isRecord(raw.web) ? raw.web : null;
  if (!section) return null;

  const clientId = optionalString(section.client_id);
  const clientSecret = optionalString(section.client_secret);
  if (!clientId || !clientSecret) return null;

  const redirectUris = Array.isArray(section.redirect_uris) ? section.redirect_uris : [];
  return { clientId, clientSecret, redirectUri: optionalString(redirectUris[0]) };
}

/**
 * Stored user token. Accepts the google-auth-library shape (`access_token`, `expiry_date`)
 * and the authorized-user file shape (`token`, `expiry` as an ISO string).
 */
export function parseStoredToken(raw: unknown): Credentials | null {
  if (!isRecord(raw)) return null;

  const accessToken = optionalString(raw.access_token) ?? optionalString(raw.token);
  const refreshToken = optionalString(raw.refresh_token);
  if (!accessToken && !refreshToken) return null;

  let expiryDate: number | undefined;
  if (typeof raw.expiry_date === "number" && Number.isFinite(raw.expiry_date)) {
    expiryDate = raw.expiry_date;
  } else if (typeof raw.expiry === "string") {
    const parsed = Date.parse(raw.expiry);
    expiryDate = Number.isNaN(parsed) ? undefined : parsed;
  }

  return {
    access_token: accessToken,
    refresh_token: refreshToken,
    expiry_date: expiryDate,
    token_type: optionalString(raw.token_type) ?? "Bearer",
    scope: optionalString(raw.scope) ?? YOUTUBE_UPLOAD_SCOPE,
  };
}

async function readJsonFile(path: string): Promise<unknown> {
  const content = await readFile(path, "utf-8");
  return JSON.parse(content);
}

/**
 * Builds an authorized OAuth2Client from files on disk. The consent flow itself is never run
 * here; a token file must already exist. Refreshed credentials are written back to it.
 */
export class GoogleOAuthCredentialProvider implements ICredentialProvider<OAuth2Client> {
  constructor(private readonly options: GoogleOAuthCredentialProviderOptions) {}

  async getSession(): Promise<Result<OAuth2Client, AuthUnavailableError>> {
    const { clientSecretsFile, tokenFile } = this.options;

    let secrets: ClientSecrets | null;
    try {
      secrets = parseClientSecrets(await readJsonFile(clientSecretsFile));
    } catch (error) {
      return err(new AuthUnavailableError(`Missing ${clientSecretsFile}. Cannot authenticate (${errorMessage(error)}).`));
    }
    if (!secrets) {
      return err(new AuthUnavailableError(`${clientSecretsFile} does not contain an installed or web OAuth client.`));
    }

    let stored: Credentials | null;
    try {
      stored = parseStoredToken(await readJsonFile(tokenFile));
    } catch (error) {
      return err(
        new AuthUnavailableError(
          `No usable token at ${tokenFile}; authorize the ${YOUTUBE_UPLOAD_SCOPE} scope first (${errorMessage(error)}).`
        )
      );
    }
    if (!stored) {
      return err(new AuthUnavailableError(`${tokenFile} holds neither an access token nor a refresh token.`));
    }

    const client = new OAuth2Client({
      clientId: secrets.clientId,
      clientSecret: secrets.clientSecret,
      redirectUri: secrets.redirectUri,
    });
    client.setCredentials(stored);

    try {
      const { token } = await client.getAccessToken();
      if (!token) {
        return err(new AuthUnavailableError("Google returned no access token."));
      }
      if (token !== stored.access_token) {
        await this.saveCredentials(client.credentials);
      }
    } catch (error) {
      return err(new AuthUnavailableError(`Token refresh failed: ${errorMessage(error)}`));
    }

    return ok(client);
  }

  private async saveCredentials(credentials: Credentials): Promise<void> {
    await writeFile(this.options.tokenFile, JSON.stringify(credentials, null, 2), "utf-8");
    console.log(`[GoogleOAuthCredentialProvider] Refreshed credentials saved to ${this.options.tokenFile}`);
  }
}
