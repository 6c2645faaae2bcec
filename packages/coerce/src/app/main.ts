#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: run the program through the Node platform runtime with its layer
// PURITY: SHELL
// EFFECT: Effect<void, never, never> after NodeContext.layer is provided
// INVARIANT: failures are reported by runMain and set a non-zero exit code
// COMPLEXITY: O(1)/O(1)
const main = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(main)
