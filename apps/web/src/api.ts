import type {
  ErrorResponse,
  ItineraryCharts,
  ItinerarySummary,
  LoginResponse,
  SessionInfo,
  WeekdayNumber,
} from '@commute-dashboard/core';
import { formatWeekdaySelection } from './chartData.js';

const API_BASE = '/api';

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function isUnauthorized(error: unknown): boolean {
  return error instanceof ApiError && error.status === 401;
}

function isErrorResponse(body: unknown): body is ErrorResponse {
  return typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string';
}

async function handle<T>(res: Response): Promise<T> {
  if (!res.ok) {
    const body: unknown = await res.json().catch(() => undefined);
    throw new ApiError(res.status, isErrorResponse(body) ? body.error : `HTTP ${res.status}`);
  }
  return res.json();
}

function authHeaders(token: string | undefined): HeadersInit {
  return token === undefined ? {} : { Authorization: `Bearer ${token}` };
}

export async function getSession(token: string | undefined): Promise<SessionInfo> {
  const res = await fetch(`${API_BASE}/session`, { headers: authHeaders(token) });
  return handle<SessionInfo>(res);
}

export async function login(password: string): Promise<string> {
  const res = await fetch(`${API_BASE}/login`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ password }),
  });
  const { token } = await handle<LoginResponse>(res);
  return token;
}

export async function logout(token: string): Promise<void> {
  const res = await fetch(`${API_BASE}/logout`, { method: 'POST', headers: authHeaders(token) });
  if (!res.ok && res.status !== 401) {
    throw new ApiError(res.status, `HTTP ${res.status}`);
  }
}

export async function getItineraries(token: string | undefined): Promise<ItinerarySummary[]> {
  const res = await fetch(`${API_BASE}/itineraries`, { headers: authHeaders(token) });
  return handle<ItinerarySummary[]>(res);
}

export async function getItineraryCharts(
  token: string | undefined,
  id: string,
  weekdays: readonly WeekdayNumber[],
): Promise<ItineraryCharts> {
  const days = formatWeekdaySelection(weekdays);
  const query = days === '' ? '' : `?days=${days}`;
  const res = await fetch(`${API_BASE}/itineraries/${encodeURIComponent(id)}${query}`, {
    headers: authHeaders(token),
  });
  return handle<ItineraryCharts>(res);
}
