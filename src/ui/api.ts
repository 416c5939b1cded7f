import type { PipelineOutcome } from '../core/types.js';

export const API_BASE = '';

export interface Limits {
  maxUploadBytes: number;
  maxDurationSeconds: number;
  allowedExtensions: string[];
  allowedHosts: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object';
}

export function isPipelineOutcome(value: unknown): value is PipelineOutcome {
  if (!isRecord(value)) return false;
  if (value.status === 'done') return isRecord(value.result) && typeof value.requestId === 'string';
  if (value.status === 'failed') return typeof value.error === 'string' && Array.isArray(value.tips);
  return false;
}

function errorMessage(body: unknown, fallback: string): string {
  if (isRecord(body) && typeof body.error === 'string') return body.error;
  return fallback;
}

async function readOutcome(res: Response): Promise<PipelineOutcome> {
  const body: unknown = await res.json().catch(() => null);
  if (isPipelineOutcome(body)) return body;
  throw new Error(errorMessage(body, res.statusText || 'Request failed'));
}

export async function analyzeUpload(file: File): Promise<PipelineOutcome> {
  const formData = new FormData();
  formData.append('file', file);
  const res = await fetch(`${API_BASE}/api/analyze/upload`, { method: 'POST', body: formData });
  return readOutcome(res);
}

export async function analyzeUrl(url: string): Promise<PipelineOutcome> {
  const res = await fetch(`${API_BASE}/api/analyze/url`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ url }),
  });
  return readOutcome(res);
}

export async function getLimits(): Promise<Limits> {
  const res = await fetch(`${API_BASE}/api/limits`);
  if (!res.ok) throw new Error(res.statusText);
  return res.json();
}

export interface Health {
  status: string;
  version: string;
  name: string;
  mimeDetector: string;
}

export async function getHealth(): Promise<Health> {
  const res = await fetch(`${API_BASE}/health`);
  if (!res.ok) throw new Error(res.statusText);
  return res.json();
}
