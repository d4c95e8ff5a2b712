export { StatsStore } from "./stats-store.js";
