import type { CardStyle } from "../types";
import type { CardRenderer } from "./layout";
import { renderNeofetch } from "./neofetch";
import { renderTerminal } from "./terminal";

export type { CardInput, CardRenderer } from "./layout";
export { defaultProfileFields, mergeFields } from "./fields";

export const RENDERERS = {
  neofetch: renderNeofetch,
  terminal: renderTerminal,
} satisfies Record<CardStyle, CardRenderer>;

export const getRenderer = (style: CardStyle): CardRenderer => RENDERERS[style];
