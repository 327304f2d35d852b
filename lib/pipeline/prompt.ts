/**
 * Liquid prompt templates.
 *
 * Templates live in prompts/*.liquid and split into messages with
 * {% chat role: "system"|"user"|"assistant" %} ... {% endchat %} blocks.
 * Inside a block, {% image expr %} embeds a base64 PNG as an image part.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  Liquid,
  Tag,
  type Context,
  type Emitter,
  type TagToken,
  type Template,
  type TopLevelToken,
} from "liquidjs";
import type { ContentPart, Message } from "./core/types";

const CHAT_OPEN = "\x01CHAT:";
const CHAT_CLOSE = "\x01ENDCHAT\x01";
const IMAGE_OPEN = "\x00IMG:";
const IMAGE_CLOSE = "\x00";

type ChatRole = "system" | "user" | "assistant";

function isChatRole(role: string): role is ChatRole {
  return role === "system" || role === "user" || role === "assistant";
}

class ChatTag extends Tag {
  private readonly role: ChatRole;
  private readonly templates: Template[] = [];

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const role = token.args.match(/role:\s*"(\w+)"/)?.[1];
    if (!role || !isChatRole(role)) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant"`);
    }
    this.role = role;
    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) => this.templates.push(tpl))
      .on("end", () => {
        throw new Error("{% chat %} missing {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`${CHAT_OPEN}${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(this.templates, ctx, emitter);
    emitter.write(CHAT_CLOSE);
  }
}

class ImageTag extends Tag {
  private readonly expression: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    this.expression = token.args.trim();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    const value = yield this.liquid.evalValue(this.expression, ctx);
    emitter.write(`${IMAGE_OPEN}${String(value)}${IMAGE_CLOSE}`);
  }
}

export const PROMPTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../prompts"
);

const engine = new Liquid({
  root: [PROMPTS_DIR],
  extname: ".liquid",
  strictVariables: false,
});

engine.registerTag("chat", ChatTag);
engine.registerTag("image", ImageTag);

export interface RenderedPrompt {
  system?: string;
  messages: Message[];
}

/**
 * Render a template into a system prompt plus conversation messages.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<RenderedPrompt> {
  const raw: string = await engine.renderFile(templateName, context);
  const result: RenderedPrompt = { messages: [] };
  const chatRegex = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;

  for (const match of raw.matchAll(chatRegex)) {
    const role = match[1];
    const body = match[2];
    if (role === "system") {
      result.system = result.system ? `${result.system}\n\n${body.trim()}` : body.trim();
    } else if (role === "user" || role === "assistant") {
      result.messages.push({ role, content: splitContent(body) });
    }
  }
  return result;
}

function splitContent(body: string): ContentPart[] {
  const parts: ContentPart[] = [];
  const imageRegex = /\x00IMG:([\s\S]*?)\x00/g;
  let lastIndex = 0;

  for (const match of body.matchAll(imageRegex)) {
    const index = match.index ?? 0;
    const before = body.slice(lastIndex, index).trim();
    if (before) parts.push({ type: "text", text: before });
    parts.push({ type: "image", image: match[1], mediaType: "image/png" });
    lastIndex = index + match[0].length;
  }

  const rest = body.slice(lastIndex).trim();
  if (rest) parts.push({ type: "text", text: rest });
  return parts;
}
