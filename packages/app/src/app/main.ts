#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: run the program through the Node platform runtime with its layer
// WHY: ensure effects execute under the platform runtime with proper teardown/logging behavior
// QUOTE(TZ): n/a
// REF: user-2026-10-18-pesel-range
// SOURCE: https://effect.website/docs/platform/runtime/ "runMain helps you execute a main effect with built-in error handling, logging, and signal management."
// FORMAT THEOREM: forall args in Argv: decode(args) = c -> runMain(program(c))
// PURITY: SHELL
// EFFECT: Effect<void, ProgramError, FileSystem | Path>
// INVARIANT: program executed with NodeContext.layer
// COMPLEXITY: O(1)/O(1)
const main = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(main)
