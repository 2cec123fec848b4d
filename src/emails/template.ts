export const TEMPLATE_VARIABLES = [
  "username",
  "password",
  "server_url",
  "server_name",
  "admin_name",
  "admin_email"
] as const;

export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];
export type TemplateVariables = Record<TemplateVariable, string>;

export const DEFAULT_TEMPLATE = `Hello {username},

Welcome to {server_name}!

Your account has been created and is ready to use. Here are your login details:

Server URL: {server_url}
Username: {username}
Password: {password}

For security reasons, we recommend changing your password after your first login.

If you have any questions or need assistance, please contact {admin_name} at {admin_email}.

Enjoy your media experience!

Best regards,
The {server_name} Team
`;

export const TEMPLATE_LEGEND = `
---
Available variables:
{username} - The user's username
{password} - The user's password
{server_url} - The URL of your Emby server
{server_name} - The name of your media server
{admin_name} - Your name as the administrator
{admin_email} - Your contact email
`;

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function isTemplateVariable(name: string): name is TemplateVariable {
  return TEMPLATE_VARIABLES.some((variable) => variable === name);
}

/**
 * Substitute the known placeholders. Values are inserted verbatim and not
 * rescanned; unknown placeholders are left as written.
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (match, name: string) => (isTemplateVariable(name) ? variables[name] : match));
}

/** Placeholder names in `template` that renderTemplate will leave untouched */
export function findUnknownPlaceholders(template: string): string[] {
  const unknown = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name !== undefined && !isTemplateVariable(name)) unknown.add(name);
  }
  return [...unknown];
}

export function welcomeSubject(serverName: string): string {
  return `Welcome to ${serverName} - Your Account is Ready`;
}
