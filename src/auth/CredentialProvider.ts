/**
 * Credential Provider
 *
 * Environment first (AMAZON_EMAIL / AMAZON_PASSWORD), then an interactive
 * prompt. The secret is never logged.
 */

import type { Credentials } from "@/core/domain/Session";
import { ConfigurationError } from "@/core/errors";
import { AUTH_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { Prompter } from "@/utils/Prompter";

export class CredentialProvider {
  constructor(
    private readonly prompter: Prompter,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async getCredentials(): Promise<Credentials> {
    const envIdentifier = this.env[AUTH_CONFIG.EMAIL_ENV]?.trim();
    const envSecret = this.env[AUTH_CONFIG.PASSWORD_ENV]?.trim();

    if (envIdentifier && envSecret) {
      logger.info({ source: "env" }, "Using credentials from environment");
      return { identifier: envIdentifier, secret: envSecret };
    }

    const identifier = envIdentifier || (await this.prompter.ask("Enter your email or phone: "));
    const secret = envSecret || (await this.prompter.askSecret("Enter your password: "));

    const missing: string[] = [];
    if (!identifier) missing.push("identifier");
    if (!secret) missing.push("secret");
    if (missing.length > 0) {
      throw new ConfigurationError("Sign-in credentials are required", missing);
    }

    return { identifier, secret };
  }
}
