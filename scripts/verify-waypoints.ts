#!/usr/bin/env node
import { runVerifyWaypoints } from "../src/server/cli/verifyWaypointsCli";

process.exitCode = runVerifyWaypoints(process.argv.slice(2));
