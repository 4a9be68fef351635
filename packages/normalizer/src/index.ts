export type { INormalizer } from "./normalizer.interface.js";
export { JiraNormalizer } from "./jira-normalizer.js";
export { ConfluenceNormalizer } from "./confluence-normalizer.js";
export { SharePointNormalizer } from "./sharepoint-normalizer.js";
export { TeamsNormalizer } from "./teams-normalizer.js";
export { getNormalizer, normalize } from "./factory.js";
export { adfToText, decodeEntities, isRecord, normalizeWhitespace, stripHtml } from "./markup.js";
