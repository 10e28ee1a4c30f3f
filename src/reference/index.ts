export type { Reference } from "./reference";
export {
  parseDockerRef,
  referenceName,
  formatReference,
  withDigest,
} from "./reference";
