import { google } from "googleapis";
import { OAuth2Client, type Credentials } from "google-auth-library";
import * as fs from "fs";
import * as path from "path";
import * as http from "http";
import { URL } from "url";
import { z } from "zod";
import { readJsonFile } from "./config.js";
import { CalendarUnavailableError } from "./errors.js";
import type { CalendarEventsApi } from "./calendar-gateway.js";

const SCOPES = ["https://www.googleapis.com/auth/calendar"];

function getCredentialsPath(configDir: string, account: string): string {
  return path.join(configDir, `credentials-${account}.json`);
}

function getTokensPath(configDir: string, account: string): string {
  return path.join(configDir, `tokens-${account}.json`);
}

const clientSecretsSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).min(1),
});

const credentialsFileSchema = z.object({
  installed: clientSecretsSchema.optional(),
  web: clientSecretsSchema.optional(),
});

const tokensFileSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  expiry_date: z.number().nullish(),
  id_token: z.string().nullish(),
});

export interface AccountFiles {
  configDir: string;
  account: string;
  log?: (message: string) => void;
}

interface OAuth2Config {
  client: OAuth2Client;
  port: number;
}

function createOAuth2Client({ configDir, account }: AccountFiles): OAuth2Config {
  const credPath = getCredentialsPath(configDir, account);
  const credentials = readJsonFile(credPath, credentialsFileSchema);
  if (!credentials) {
    throw new CalendarUnavailableError(
      `Credentials file not found at ${credPath}. ` +
        "Download OAuth2 credentials (Desktop app) from Google Cloud Console " +
        `and save them as config/credentials-${account}.json`
    );
  }
  const config = credentials.installed ?? credentials.web;
  if (!config) {
    throw new CalendarUnavailableError(`Invalid credentials format in ${credPath}`);
  }
  const redirectUri = config.redirect_uris[0];
  const url = new URL(redirectUri);

  return {
    client: new OAuth2Client(config.client_id, config.client_secret, redirectUri),
    port: url.port ? parseInt(url.port, 10) : 80,
  };
}

function saveTokens(files: AccountFiles, tokens: Credentials): void {
  const tokensPath = getTokensPath(files.configDir, files.account);
  fs.writeFileSync(tokensPath, JSON.stringify(tokens, null, 2));
  files.log?.(`Tokens saved to ${tokensPath}`);
}

/**
 * Load stored credentials and tokens without any user interaction.
 * Throws CalendarUnavailableError when the account is not set up.
 * Refreshed tokens are written back to the tokens file.
 */
export async function getAuthenticatedClient(files: AccountFiles): Promise<OAuth2Client> {
  const { client } = createOAuth2Client(files);
  const tokensPath = getTokensPath(files.configDir, files.account);
  const tokens = readJsonFile(tokensPath, tokensFileSchema);
  if (!tokens) {
    throw new CalendarUnavailableError(
      `No tokens for Google account "${files.account}". Run "npm run auth ${files.account}" first.`
    );
  }

  client.setCredentials(tokens);
  client.on("tokens", (fresh) => {
    saveTokens(files, { ...tokens, ...fresh });
  });

  if (tokens.expiry_date && tokens.expiry_date < Date.now()) {
    files.log?.("Token expired, refreshing...");
    await client.getAccessToken();
  }

  return client;
}

/**
 * Connection factory for the calendar gateway
 */
export async function connectCalendarEvents(files: AccountFiles): Promise<CalendarEventsApi> {
  const auth = await getAuthenticatedClient(files);
  return google.calendar({ version: "v3", auth }).events;
}

/**
 * Interactive OAuth flow: print the consent URL, wait for the redirect on
 * the local callback port, and store the resulting tokens.
 */
export async function authorizeAccount(files: AccountFiles): Promise<Credentials> {
  const { client, port } = createOAuth2Client(files);
  const log = files.log ?? (() => {});

  const authUrl = client.generateAuthUrl({
    access_type: "offline",
    scope: SCOPES,
    prompt: "consent",
  });

  log("\nAuthorize this app by visiting this URL:\n");
  log(authUrl);
  log("\nWaiting for authorization...\n");

  const tokens = await new Promise<Credentials>((resolve, reject) => {
    const server = http.createServer((req, res) => {
      if (!req.url?.startsWith("/oauth2callback") && !req.url?.startsWith("/?")) {
        res.writeHead(404);
        res.end();
        return;
      }
      const url = new URL(req.url, `http://localhost:${port}`);
      const code = url.searchParams.get("code");

      if (!code) {
        res.writeHead(400);
        res.end("No authorization code received");
        server.close();
        reject(new Error("No authorization code"));
        return;
      }

      client.getToken(code).then(
        ({ tokens: received }) => {
          res.writeHead(200, { "Content-Type": "text/html" });
          res.end("<h1>Authorization successful!</h1><p>You can close this window.</p>");
          server.close();
          resolve(received);
        },
        (err: unknown) => {
          res.writeHead(500);
          res.end("Authorization failed");
          server.close();
          reject(err);
        }
      );
    });

    server.listen(port, () => {
      log(`Listening on http://localhost:${port} for OAuth callback...`);
    });
  });

  saveTokens(files, tokens);
  return tokens;
}

// List accounts that have credentials files
export function listAvailableAccounts(configDir: string): string[] {
  if (!fs.existsSync(configDir)) return [];
  return fs
    .readdirSync(configDir)
    .filter((f) => f.startsWith("credentials-") && f.endsWith(".json"))
    .map((f) => f.replace("credentials-", "").replace(".json", ""));
}
