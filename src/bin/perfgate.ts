#!/usr/bin/env node
import { runValidateCli } from "../cli/ValidateCLI.ts";

process.exitCode = await runValidateCli();
