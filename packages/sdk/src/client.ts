import type { Activity, ActivityRegistry, ErrorResponse, MessageResponse } from "./types";

export class ActivityApiError extends Error {
  readonly status: number;
  readonly detail: unknown;

  constructor(status: number, detail: unknown) {
    super(typeof detail === "string" ? detail : `Activity API request failed: ${status}`);
    this.name = "ActivityApiError";
    this.status = status;
    this.detail = detail;
  }
}

export async function fetchActivities(apiUrl: string): Promise<ActivityRegistry> {
  const res = await fetch(new URL("/activities", apiUrl).toString());
  if (!res.ok) {
    throw await toApiError(res);
  }
  return (await res.json()) as ActivityRegistry;
}

export async function fetchActivity(apiUrl: string, name: string): Promise<Activity | null> {
  const res = await fetch(new URL(activityPath(name), apiUrl).toString());
  if (res.status === 404) return null;
  if (!res.ok) {
    throw await toApiError(res);
  }
  return (await res.json()) as Activity;
}

export function signupForActivity(apiUrl: string, name: string, email: string): Promise<MessageResponse> {
  return postMembership(apiUrl, name, "signup", email);
}

export function unregisterFromActivity(apiUrl: string, name: string, email: string): Promise<MessageResponse> {
  return postMembership(apiUrl, name, "unregister", email);
}

async function postMembership(
  apiUrl: string,
  name: string,
  action: "signup" | "unregister",
  email: string
): Promise<MessageResponse> {
  const url = new URL(`${activityPath(name)}/${action}`, apiUrl);
  url.searchParams.set("email", email);
  const res = await fetch(url.toString(), { method: "POST" });
  if (!res.ok) {
    throw await toApiError(res);
  }
  return (await res.json()) as MessageResponse;
}

function activityPath(name: string): string {
  return `/activities/${encodeURIComponent(name)}`;
}

async function toApiError(res: Response): Promise<ActivityApiError> {
  const payload = (await res.json().catch(() => null)) as Partial<ErrorResponse> | null;
  return new ActivityApiError(res.status, payload?.detail ?? null);
}
