/**
 * Error classes and sentinel errors.
 *
 * Sentinels are pre-allocated and compared by identity:
 *
 * ```ts
 * try {
 *   await client.workspaces.readById("ws-123");
 * } catch (err) {
 *   if (err === ErrResourceNotFound) { ... }
 * }
 * ```
 */

export class TFEError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TFEError";
  }
}

/**
 * A failed response whose error payload was composed into a message.
 */
export class APIError extends TFEError {
  readonly status: number;
  readonly messages: string[];

  constructor(status: number, messages: string[]) {
    super(messages.join("\n"));
    this.name = "APIError";
    this.status = status;
    this.messages = messages;
  }
}

/**
 * A response document that does not match the shape the caller asked for.
 */
export class DecodeError extends TFEError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

function sentinel(message: string): TFEError {
  return Object.freeze(new TFEError(message));
}

// ============================================================================
// Plumbing
// ============================================================================

export const ErrItemsMustBeSlice = sentinel(`document field "data" must be an array`);
export const ErrInvalidDocument = sentinel("document must contain a single resource object");
export const ErrInvalidRequestBody = sentinel(
  "request body must be a jsonapi, json or raw body"
);
export const ErrInvalidStructFormat = sentinel(
  "resource can't use the same member as both an attribute and a relationship"
);

// ============================================================================
// Server responses
// ============================================================================

export const ErrInvalidIncludeValue = sentinel(`invalid value for "include" field`);
export const ErrUnauthorized = sentinel("unauthorized");
export const ErrResourceNotFound = sentinel("resource not found");
export const ErrWorkspaceLocked = sentinel("workspace already locked");
export const ErrWorkspaceNotLocked = sentinel("workspace already unlocked");

// ============================================================================
// Local validation
// ============================================================================

export const ErrInvalidOrg = sentinel("invalid value for organization");
export const ErrInvalidName = sentinel("invalid value for name");
export const ErrRequiredName = sentinel("name is required");
export const ErrRequiredEmail = sentinel("email is required");
export const ErrInvalidWorkspaceID = sentinel("invalid value for workspace ID");
export const ErrInvalidWorkspaceValue = sentinel("invalid value for workspace");
export const ErrRequiredWorkspace = sentinel("workspace is required");
export const ErrRequiredWorkspacesList = sentinel("no workspaces list provided");
export const ErrInvalidProjectID = sentinel("invalid value for project ID");
export const ErrInvalidRunID = sentinel("invalid value for run ID");
export const ErrInvalidPlanID = sentinel("invalid value for plan ID");
export const ErrInvalidApplyID = sentinel("invalid value for apply ID");
export const ErrInvalidVariableID = sentinel("invalid value for variable ID");
export const ErrRequiredKey = sentinel("key is required");
export const ErrRequiredCategory = sentinel("category is required");
export const ErrInvalidVariableSetID = sentinel("invalid value for variable set ID");
export const ErrRequiredGlobalFlag = sentinel("global flag is required");
export const ErrInvalidPolicyID = sentinel("invalid value for policy ID");
export const ErrRequiredEnforcementLevel = sentinel("enforcement-level is required");
export const ErrInvalidNotificationConfigID = sentinel(
  "invalid value for notification configuration ID"
);
export const ErrRequiredDestinationType = sentinel("destination type is required");
export const ErrRequiredEnabled = sentinel("enabled is required");
export const ErrRequiredURL = sentinel("url is required");
export const ErrInvalidNotificationTrigger = sentinel("invalid value for notification trigger");
export const ErrInvalidRegistryName = sentinel(
  `invalid value for registry-name. It must be either "private" or "public"`
);
export const ErrRequiredNamespace = sentinel("namespace is required");
export const ErrInvalidNamespace = sentinel("invalid value for namespace");
export const ErrRequiredProvider = sentinel("provider is required");
export const ErrInvalidProvider = sentinel("invalid value for provider");
export const ErrRequiredVersion = sentinel("version is required");
export const ErrInvalidVersion = sentinel("invalid value for version");
export const ErrNamespaceMustMatchOrg = sentinel(
  "namespace must match organization name for private providers"
);
