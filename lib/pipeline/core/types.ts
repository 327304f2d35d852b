/**
 * Core types for the deck pipeline.
 *
 * These types define the data structures that flow between stages and
 * the contracts of the collaborators the pipeline is constructed with.
 * They are independent of storage, providers, or rendering backends.
 */

import type { PipelineError } from "./errors";

// ============================================================================
// Geometry
// ============================================================================

export interface CoordinateSpace {
  readonly width: number;
  readonly height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ============================================================================
// Page artifacts
// ============================================================================

export type TextAlignment = "left" | "center" | "right" | "justify";
export type FitMode = "contain" | "cover" | "fill";

export interface FontStyle {
  family: string;
  size: number;
  color: string; // "#RRGGBB"
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

interface ElementBase {
  id: string; // "pg001_el001"
  position: Point;
  size: Size;
  zIndex: number;
  opacity: number;
}

export interface TextElement extends ElementBase {
  type: "text";
  content: string;
  font: FontStyle;
  alignment: TextAlignment;
  lineSpacing: number;
}

export interface ImageGenerationRequest {
  prompt: string;
  size: string; // "1024x1024"
}

export interface ImageElement extends ElementBase {
  type: "image";
  /** Key used to match produced assets during assembly */
  assetId: string;
  source: string;
  fitMode: FitMode;
  altText: string;
  generation?: ImageGenerationRequest;
  /** Box in the space the element was described in, set by normalizePage */
  origin?: { space: CoordinateSpace; box: Box };
}

export type ElementRecord = TextElement | ImageElement;
export type ElementType = ElementRecord["type"];

export type BackgroundDescriptor =
  | { type: "color"; color: string }
  | { type: "image"; source: string; assetId: string }
  | { type: "none" };

export interface PageArtifact {
  id: string; // "pg001"
  pageNumber: number;
  title: string;
  notes?: string;
  layout?: string;
  elements: ElementRecord[];
  background: BackgroundDescriptor;
  size: CoordinateSpace;
}

/** Deck-wide settings handed to the renderer alongside the pages. */
export interface DeckSettings {
  size: CoordinateSpace;
  theme: string;
  background: string;
  defaultFontFamily: string;
  defaultFontSize: number;
  title?: string;
}

// ============================================================================
// Retry policy and tasks
// ============================================================================

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly backoffMultiplier: number;
  /** Per-attempt timeout; expiry counts as a retryable failure */
  readonly timeoutMs?: number;
}

export interface TaskRequest<P> {
  id: string;
  payload: P;
}

export type TaskResult<R> =
  | { readonly id: string; readonly status: "pending" }
  | { readonly id: string; readonly status: "success"; readonly value: R }
  | { readonly id: string; readonly status: "failed"; readonly error: Error };

export type SettledTaskResult<R> = Exclude<TaskResult<R>, { status: "pending" }>;

// ============================================================================
// Model Gateway
// ============================================================================

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; image: string; mediaType?: string }; // base64

export interface Message {
  role: "user" | "assistant";
  content: string | ContentPart[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface GenerateObjectOptions {
  system?: string;
  messages: Message[];
  abortSignal?: AbortSignal;
  /** Checked before a response is cached; cached entries that fail are dropped */
  validate?: (object: unknown) => ValidationResult;
  /** Logging context */
  log?: {
    taskType: string;
    pageId?: string;
    promptName: string;
  };
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerateObjectResult {
  /** Untrusted JSON value; hand it to the parser */
  object: unknown;
  usage?: TokenUsage;
  cached?: boolean;
}

export interface GenerateImageOptions {
  prompt: string;
  size?: string;
  abortSignal?: AbortSignal;
  log?: { taskType: string; pageId?: string };
}

export interface GeneratedImage {
  bytes: Uint8Array;
  mediaType: string;
}

/**
 * Generative service. Implementations surface failures as gateway
 * PipelineErrors so the step runner can decide on retries.
 */
export interface ModelGateway {
  generateObject(options: GenerateObjectOptions): Promise<GenerateObjectResult>;
  generateImage(options: GenerateImageOptions): Promise<GeneratedImage>;
}

// ============================================================================
// Input, assets, rendering
// ============================================================================

export interface InputUnit {
  id: string; // "pg001"
  index: number;
  /** PNG bytes */
  image: Buffer;
  width: number;
  height: number;
}

export interface RawInputLoader {
  load(source: string): AsyncIterable<InputUnit>;
}

export interface AssetLocation {
  path: string;
  byteLength: number;
}

export type WriteResult =
  | { ok: true; location: AssetLocation }
  | { ok: false; error: PipelineError<"resource-boundary"> };

export interface AssetStore {
  readonly root: string;
  readonly count: number;
  write(bytes: Uint8Array, destination: string): Promise<WriteResult>;
}

export interface RenderedDocument {
  path: string;
  pageCount: number;
}

export interface DocumentRenderer {
  render(pages: PageArtifact[], settings: DeckSettings): Promise<RenderedDocument>;
}
