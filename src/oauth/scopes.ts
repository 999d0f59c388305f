import type { ServiceName } from "../types.js";

const GOOGLE = "https://www.googleapis.com/auth";

export const OPENID_SCOPE = "openid";
export const USERINFO_EMAIL_SCOPE = `${GOOGLE}/userinfo.email`;
export const USERINFO_PROFILE_SCOPE = `${GOOGLE}/userinfo.profile`;

export const GMAIL_READONLY_SCOPE = `${GOOGLE}/gmail.readonly`;
export const GMAIL_SEND_SCOPE = `${GOOGLE}/gmail.send`;
export const GMAIL_COMPOSE_SCOPE = `${GOOGLE}/gmail.compose`;
export const GMAIL_MODIFY_SCOPE = `${GOOGLE}/gmail.modify`;
export const GMAIL_LABELS_SCOPE = `${GOOGLE}/gmail.labels`;

export const DRIVE_SCOPE = `${GOOGLE}/drive`;
export const DRIVE_READONLY_SCOPE = `${GOOGLE}/drive.readonly`;
export const DRIVE_FILE_SCOPE = `${GOOGLE}/drive.file`;

export const DOCS_SCOPE = `${GOOGLE}/documents`;
export const DOCS_READONLY_SCOPE = `${GOOGLE}/documents.readonly`;

export const SHEETS_SCOPE = `${GOOGLE}/spreadsheets`;
export const SHEETS_READONLY_SCOPE = `${GOOGLE}/spreadsheets.readonly`;

export const SCRIPT_PROJECTS_SCOPE = `${GOOGLE}/script.projects`;
export const SCRIPT_PROJECTS_READONLY_SCOPE =
  `${GOOGLE}/script.projects.readonly`;
export const SCRIPT_DEPLOYMENTS_SCOPE = `${GOOGLE}/script.deployments`;
export const SCRIPT_DEPLOYMENTS_READONLY_SCOPE =
  `${GOOGLE}/script.deployments.readonly`;
export const SCRIPT_PROCESSES_SCOPE = `${GOOGLE}/script.processes`;

export const CHAT_MESSAGES_SCOPE = `${GOOGLE}/chat.messages`;
export const CHAT_MESSAGES_READONLY_SCOPE = `${GOOGLE}/chat.messages.readonly`;
export const CHAT_SPACES_SCOPE = `${GOOGLE}/chat.spaces`;

export const BASE_SCOPES = [
  OPENID_SCOPE,
  USERINFO_EMAIL_SCOPE,
  USERINFO_PROFILE_SCOPE,
] as const;

export const SERVICE_NAMES: readonly ServiceName[] = [
  "gmail",
  "drive",
  "docs",
  "sheets",
  "script",
  "chat",
];

type ServiceScopes = { full: string[]; readOnly: string[] };

// Docs and sheets list their files through Drive, so they carry the narrow
// Drive scopes they need and never full Drive access.
const SERVICE_SCOPES: Record<ServiceName, ServiceScopes> = {
  gmail: {
    full: [
      GMAIL_READONLY_SCOPE,
      GMAIL_SEND_SCOPE,
      GMAIL_COMPOSE_SCOPE,
      GMAIL_MODIFY_SCOPE,
      GMAIL_LABELS_SCOPE,
    ],
    readOnly: [GMAIL_READONLY_SCOPE],
  },
  drive: {
    full: [DRIVE_SCOPE, DRIVE_READONLY_SCOPE, DRIVE_FILE_SCOPE],
    readOnly: [DRIVE_READONLY_SCOPE],
  },
  docs: {
    full: [
      DOCS_SCOPE,
      DOCS_READONLY_SCOPE,
      DRIVE_READONLY_SCOPE,
      DRIVE_FILE_SCOPE,
    ],
    readOnly: [DOCS_READONLY_SCOPE, DRIVE_READONLY_SCOPE],
  },
  sheets: {
    full: [SHEETS_SCOPE, SHEETS_READONLY_SCOPE, DRIVE_READONLY_SCOPE],
    readOnly: [SHEETS_READONLY_SCOPE, DRIVE_READONLY_SCOPE],
  },
  script: {
    full: [
      SCRIPT_PROJECTS_SCOPE,
      SCRIPT_PROJECTS_READONLY_SCOPE,
      SCRIPT_DEPLOYMENTS_SCOPE,
      SCRIPT_DEPLOYMENTS_READONLY_SCOPE,
      SCRIPT_PROCESSES_SCOPE,
      DRIVE_FILE_SCOPE,
    ],
    readOnly: [
      SCRIPT_PROJECTS_READONLY_SCOPE,
      SCRIPT_DEPLOYMENTS_READONLY_SCOPE,
      SCRIPT_PROCESSES_SCOPE,
    ],
  },
  chat: {
    full: [
      CHAT_MESSAGES_SCOPE,
      CHAT_MESSAGES_READONLY_SCOPE,
      CHAT_SPACES_SCOPE,
    ],
    readOnly: [CHAT_MESSAGES_READONLY_SCOPE],
  },
};

export function isServiceName(value: string): value is ServiceName {
  return SERVICE_NAMES.some((name) => name === value);
}

/**
 * Scopes to request for the enabled services: identity scopes first, then
 * each service's scopes in order, without duplicates.
 */
export function getScopesForServices(
  services: readonly ServiceName[],
  options?: { readOnly?: boolean }
) {
  const readOnly = options?.readOnly ?? false;
  const scopes = new Set<string>(BASE_SCOPES);
  for (const service of services) {
    const table = SERVICE_SCOPES[service];
    for (const scope of readOnly ? table.readOnly : table.full) {
      scopes.add(scope);
    }
  }
  return Array.from(scopes);
}

export function missingScopes(
  granted: readonly string[],
  required: readonly string[]
) {
  const grantedSet = new Set(granted);
  // Full Drive access implies the narrower Drive scopes.
  if (grantedSet.has(DRIVE_SCOPE)) {
    grantedSet.add(DRIVE_READONLY_SCOPE);
    grantedSet.add(DRIVE_FILE_SCOPE);
  }
  return required.filter((scope) => !grantedSet.has(scope));
}

export function parseScopeString(value: string | undefined) {
  if (!value) {
    return [];
  }
  return value.split(" ").filter(Boolean);
}
