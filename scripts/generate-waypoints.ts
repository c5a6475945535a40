#!/usr/bin/env node
import { runGenerateWaypoints } from "../src/server/cli/generateWaypointsCli";

process.exitCode = runGenerateWaypoints(process.argv.slice(2));
