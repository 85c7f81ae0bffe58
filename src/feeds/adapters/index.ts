import type { FeedDialect } from "../../config";
import type { FeedAdapter } from "../types";
import { beincryptoAdapter } from "./beincrypto";
import { decryptAdapter } from "./decrypt";

export const feedAdapters: Readonly<Record<FeedDialect, FeedAdapter>> = {
  decrypt: decryptAdapter,
  beincrypto: beincryptoAdapter,
};

export { normalizeCategories, attributeUrl, createRssAdapter } from "./rss";
