/**
 * Responses API shapes spoken by the backend
 */

import type { ReasoningEffort } from './index.js';

export interface BackendInputText {
  type: 'input_text';
  text: string;
}

export interface BackendInputImage {
  type: 'input_image';
  image_url: string;
  detail?: 'auto' | 'low' | 'high';
}

/**
 * Unknown client part kinds are forwarded as-is
 */
export interface BackendOpaquePart {
  type: string;
  [key: string]: unknown;
}

export type BackendContentPart = BackendInputText | BackendInputImage | BackendOpaquePart;

export interface BackendInputItem {
  type: 'message';
  role: string;
  content: BackendContentPart[];
}

export interface BackendRequest {
  model: string;
  instructions: string;
  input: BackendInputItem[];
  tools: unknown[];
  tool_choice?: unknown;
  /** Always false: the bridge never persists conversation state on the backend */
  store: false;
  stream: boolean;
  reasoning?: { effort: Exclude<ReasoningEffort, 'none'> };
}

export interface BackendOutputContent {
  type: string;
  text?: string;
}

export interface BackendOutputItem {
  type: string;
  id?: string;
  role?: string;
  content?: BackendOutputContent[];
}

export interface BackendUsage {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
}

/**
 * Single-shot backend response (also the payload of terminal stream events)
 */
export interface BackendResponse {
  id?: string;
  model?: string;
  status?: string;
  incomplete_details?: { reason?: string } | null;
  output?: BackendOutputItem[];
  usage?: BackendUsage | null;
  error?: { message?: string; code?: string } | null;
}

/**
 * One decoded backend stream event. Only the fields the bridge reads are typed.
 */
export interface BackendStreamEvent {
  type: string;
  delta?: unknown;
  item?: BackendOutputItem;
  response?: BackendResponse;
  message?: string;
  code?: string;
  error?: { message?: string; code?: string };
}
