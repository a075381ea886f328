export { researchNode, researchQuery } from "./research.js";
export { outlineNode } from "./outline.js";
export { writeNode, parseDraft } from "./write.js";
export { critiqueNode } from "./critique.js";
export { optimizeNode, finalFromDraft } from "./optimize.js";
export { publishNode } from "./publish.js";
export { formatSources, slugify } from "./sources.js";
