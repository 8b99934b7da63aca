#!/usr/bin/env node
import { createMeshSshCli } from "./cli/mesh-ssh-cli.js";

await createMeshSshCli().parseAsync(process.argv);
