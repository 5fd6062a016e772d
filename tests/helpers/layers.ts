// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test helpers for providing Effect platform layers in tests.
 * NodeContext.layer provides FileSystem.FileSystem, Path and the other
 * platform services from @effect/platform-node.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, type Exit, type Layer } from "effect";

/**
 * Test layer providing all platform services.
 * Use with runTest/runTestExit for effects requiring FileSystem.
 */
export const TestLayer: Layer.Layer<NodeContext.NodeContext> = NodeContext.layer;

/**
 * Run an effect in tests with platform services provided.
 */
export const runTest = <A, E>(effect: Effect.Effect<A, E, NodeContext.NodeContext>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestLayer)));

/**
 * Run an effect in tests and return the Exit value.
 */
export const runTestExit = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<Exit.Exit<A, E>> => Effect.runPromiseExit(effect.pipe(Effect.provide(TestLayer)));

/** Fresh temporary directory; pair with `removeTempDir` in afterEach. */
export const makeTempDir = (): Promise<string> => mkdtemp(join(tmpdir(), "versio-test-"));

export const removeTempDir = (dir: string): Promise<void> =>
  rm(dir, { recursive: true, force: true });
