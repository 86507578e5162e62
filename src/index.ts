#!/usr/bin/env node
import "dotenv/config";

import { main } from "./cli.js";

process.exitCode = await main();
