import "dotenv/config";

import { MongoClient } from "mongodb";
import { collectionsFor } from "../src/collections.js";
import { loadConfig } from "../src/config.js";
import { migrate } from "../src/migrate.js";

const config = loadConfig();
const client = new MongoClient(config.mongoUrl);

// A rejected top-level await exits the process with a non-zero code.
await migrate(client, collectionsFor(client.db(config.dbName)));
