/**
 * Welcome email generation
 *
 * Reads the users CSV and renders one message per account into an
 * Email/Subject/Message CSV that can be fed to a mail-merge tool.
 */

import fs from "node:fs";
import type { Logger } from "../logger.js";
import type { CSVRow } from "../types.js";
import { errorMessage } from "../errors.js";
import { readAccountsCsv } from "../csv/accountsCsv.js";
import { writeCsv } from "../csv/writeCsv.js";
import {
  DEFAULT_TEMPLATE,
  TEMPLATE_LEGEND,
  findUnknownPlaceholders,
  renderTemplate,
  welcomeSubject,
  type TemplateVariables
} from "./template.js";

export const DEFAULT_SERVER_NAME = "Media Server";
export const DEFAULT_ADMIN_NAME = "Server Admin";
export const DEFAULT_ADMIN_EMAIL = "admin@example.com";

export type EmailSettings = {
  serverUrl: string;
  serverName?: string;
  adminName?: string;
  adminEmail?: string;
  /** Path to a custom template; the built-in one is used when absent or unreadable */
  templatePath?: string;
};

export const WELCOME_EMAIL_COLUMNS = ["Email", "Subject", "Message"] as const;

export type WelcomeEmail = {
  Email: string;
  Subject: string;
  Message: string;
};

export type GenerateResult = {
  generated: number;
  skipped: number;
};

export async function loadTemplate(templatePath: string | undefined, logger: Logger): Promise<string> {
  if (!templatePath) return DEFAULT_TEMPLATE;
  if (!fs.existsSync(templatePath)) {
    logger.warn(`Template file not found: ${templatePath}; using the default template`);
    return DEFAULT_TEMPLATE;
  }
  try {
    const template = await fs.promises.readFile(templatePath, "utf8");
    logger.info(`Using custom email template from ${templatePath}`);
    const unknown = findUnknownPlaceholders(template);
    if (unknown.length > 0) {
      logger.warn(`Template has unknown placeholder(s) that will be left as-is: ${unknown.map((n) => `{${n}}`).join(", ")}`);
    }
    return template;
  } catch (err) {
    logger.error(`Error reading template file: ${errorMessage(err)}`);
    logger.info("Falling back to default template");
    return DEFAULT_TEMPLATE;
  }
}

/** Undefined when the row lacks a username, email or passphrase */
export function composeEmail(row: CSVRow, template: string, settings: EmailSettings): WelcomeEmail | undefined {
  const username = row.Username ?? "";
  const email = row.Email ?? "";
  const password = row.Passphrase ?? "";
  if (!username || !email || !password) return undefined;

  const serverName = settings.serverName || DEFAULT_SERVER_NAME;
  const variables: TemplateVariables = {
    username,
    password,
    server_url: settings.serverUrl,
    server_name: serverName,
    admin_name: settings.adminName || DEFAULT_ADMIN_NAME,
    admin_email: settings.adminEmail || DEFAULT_ADMIN_EMAIL
  };
  return {
    Email: email,
    Subject: welcomeSubject(serverName),
    Message: renderTemplate(template, variables)
  };
}

export async function generateWelcomeEmails(
  inputCsv: string,
  outputCsv: string,
  settings: EmailSettings,
  logger: Logger
): Promise<GenerateResult> {
  const template = await loadTemplate(settings.templatePath, logger);
  const { rows } = await readAccountsCsv(inputCsv);

  const emails: WelcomeEmail[] = [];
  let skipped = 0;
  for (const row of rows) {
    const email = composeEmail(row, template, settings);
    if (!email) {
      logger.warn(`Skipping row with missing data (Username: ${row.Username || "?"})`);
      skipped += 1;
      continue;
    }
    emails.push(email);
  }

  await writeCsv(emails, WELCOME_EMAIL_COLUMNS, outputCsv);
  logger.info(`Generated ${emails.length} welcome emails and saved to ${outputCsv}`);
  return { generated: emails.length, skipped };
}

/** The first row's email as printable text, or undefined when there is nothing to show */
export async function previewWelcomeEmail(inputCsv: string, settings: EmailSettings, logger: Logger): Promise<string | undefined> {
  const template = await loadTemplate(settings.templatePath, logger);
  const { rows } = await readAccountsCsv(inputCsv);

  const first = rows[0];
  if (!first) {
    logger.error("No data found in CSV for preview");
    return undefined;
  }
  const email = composeEmail(first, template, settings);
  if (!email) {
    logger.warn(`Preview row has missing data (Username: ${first.Username || "?"})`);
    return undefined;
  }

  const rule = "=".repeat(50);
  return [rule, `PREVIEW: Email to ${email.Email}`, `Subject: ${email.Subject}`, rule, email.Message, rule].join("\n");
}

export async function createTemplateFile(outputPath: string, logger: Logger): Promise<void> {
  await fs.promises.writeFile(outputPath, DEFAULT_TEMPLATE + TEMPLATE_LEGEND, "utf8");
  logger.info(`Custom template created at ${outputPath}`);
  logger.info("Edit this file to customize your welcome emails");
}
