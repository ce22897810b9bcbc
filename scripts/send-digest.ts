#!/usr/bin/env tsx
import process from "node:process";
import { runCli } from "../src/cli";

process.exit(await runCli());
