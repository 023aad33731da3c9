export { WorkspaceArtifacts } from "./WorkspaceArtifacts.js";
