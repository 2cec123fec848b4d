#!/usr/bin/env node
/**
 * Generate welcome emails for newly created users
 *
 * Reads the same users CSV as create-users and writes Email/Subject/Message
 * rows for a mail-merge tool.
 */

import "dotenv/config";
import { Command } from "commander";
import path from "node:path";
import chalk from "chalk";
import { createLogger } from "../src/logger.js";
import { errorMessage } from "../src/errors.js";
import {
  DEFAULT_ADMIN_EMAIL,
  DEFAULT_ADMIN_NAME,
  DEFAULT_SERVER_NAME,
  createTemplateFile,
  generateWelcomeEmails,
  previewWelcomeEmail,
  type EmailSettings
} from "../src/emails/welcomeEmails.js";

const program = new Command();

program
  .name("generate-welcome-emails")
  .description("Generate welcome emails for Emby users")
  .option("--input <path>", "Input CSV file with user data (Username, Email, Passphrase)")
  .option("--output <path>", "Output CSV file for welcome emails", "welcome_emails.csv")
  .option("--server-url <url>", "Emby server URL shown to users (env: EMBY_SERVER_URL)")
  .option("--server-name <name>", "Name of your media server", DEFAULT_SERVER_NAME)
  .option("--admin-name <name>", "Administrator name", DEFAULT_ADMIN_NAME)
  .option("--admin-email <email>", "Administrator contact email", DEFAULT_ADMIN_EMAIL)
  .option("--template <path>", "Custom email template file")
  .option("--create-template <path>", "Write the default template to a file and exit")
  .option("--preview", "Print the email for the first user and exit", false)
  .option("--log-file <path>", "Log file (appended to)", "welcome_emails.log")
  .parse(process.argv);

type Options = {
  input?: string;
  output: string;
  serverUrl?: string;
  serverName: string;
  adminName: string;
  adminEmail: string;
  template?: string;
  createTemplate?: string;
  preview: boolean;
  logFile: string;
};

async function main(): Promise<number> {
  const opts = program.opts<Options>();
  const logger = createLogger({ logFile: opts.logFile });

  try {
    if (opts.createTemplate) {
      await createTemplateFile(path.resolve(opts.createTemplate), logger);
      return 0;
    }

    if (!opts.input) {
      logger.error("--input is required unless --create-template is used");
      return 1;
    }
    const serverUrl = (opts.serverUrl ?? process.env.EMBY_SERVER_URL ?? "").trim();
    if (!serverUrl) {
      logger.error("Server URL is required (--server-url or EMBY_SERVER_URL)");
      return 1;
    }

    const inputPath = path.resolve(opts.input);
    const settings: EmailSettings = {
      serverUrl,
      serverName: opts.serverName,
      adminName: opts.adminName,
      adminEmail: opts.adminEmail,
      templatePath: opts.template ? path.resolve(opts.template) : undefined
    };

    if (opts.preview) {
      const preview = await previewWelcomeEmail(inputPath, settings, logger);
      if (preview === undefined) return 1;
      console.log(preview);
      return 0;
    }

    const outputPath = path.resolve(opts.output);
    const result = await generateWelcomeEmails(inputPath, outputPath, settings, logger);
    console.log(chalk.green(`✓ ${result.generated} email(s) written to ${outputPath}`));
    if (result.skipped > 0) {
      console.log(chalk.yellow(`⚠️  ${result.skipped} row(s) skipped for missing data`));
    }
    return 0;
  } catch (err) {
    logger.error(`Fatal error: ${errorMessage(err)}`);
    return 1;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
