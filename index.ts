#!/usr/bin/env tsx
import { program } from "./src/cli/index";

await program.parseAsync(process.argv);
