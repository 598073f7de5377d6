export {
  createDriver,
  healthCheck,
  closeDriver,
  neo4jConnectionFromConfig,
} from "./driver.js";

export type {
  Driver,
  Session,
  Neo4jConnection,
} from "./driver.js";
