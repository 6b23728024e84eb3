/**
 * Persisted GraphQL operations understood by the event platform.
 *
 * The platform only accepts persisted queries: each request names an
 * operation and sends the sha256 hash of its query text instead of the
 * query itself. Requests are batched as a JSON array of operations.
 */

export const LIST_OPERATION = "EventPeopleListViewConnectionQuery";
export const DETAIL_OPERATION = "EventPersonDetailsQuery";

export interface PersistedOperation {
  operationName: string;
  variables: Record<string, unknown>;
  extensions: {
    persistedQuery: {
      version: 1;
      sha256Hash: string;
    };
  };
}

function persisted(
  operationName: string,
  sha256Hash: string,
  variables: Record<string, unknown>,
): PersistedOperation {
  return {
    operationName,
    variables,
    extensions: { persistedQuery: { version: 1, sha256Hash } },
  };
}

/** People list for a view. Omit the cursor for the first page. */
export function listPeopleOperation(
  viewId: string,
  sha256Hash: string,
  cursor?: string,
): PersistedOperation {
  const variables: Record<string, unknown> = { viewId };
  if (cursor !== undefined) variables.endCursor = cursor;
  return persisted(LIST_OPERATION, sha256Hash, variables);
}

export function personDetailOperation(
  personId: string,
  eventId: string,
  sha256Hash: string,
): PersistedOperation {
  return persisted(DETAIL_OPERATION, sha256Hash, { personId, eventId });
}
