export { InMemoryEventBus } from "./InMemoryEventBus.js";
