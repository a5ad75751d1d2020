export { assemble, formatCandidate } from "./context-assembler.js";
