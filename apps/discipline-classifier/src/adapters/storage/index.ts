export { LocalFileStore } from "./LocalFileStore.js";
export { LocalContentStore } from "./LocalContentStore.js";
export { storePath } from "./storeKeys.js";
