// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Relational operators derived from a single three-way comparison.
 * A value that cannot be compared yields `None`; every relation is then
 * false except `ne`.
 */

import { Option } from "effect";

export type Ordering = -1 | 0 | 1;

export interface Comparable {
  compare(other: unknown): Option.Option<Ordering>;
}

export type Relation = "lt" | "le" | "eq" | "ne" | "ge" | "gt";

const RELATIONS: Readonly<Record<Relation, (o: Ordering) => boolean>> = {
  lt: (o) => o < 0,
  le: (o) => o <= 0,
  eq: (o) => o === 0,
  ne: (o) => o !== 0,
  ge: (o) => o >= 0,
  gt: (o) => o > 0,
};

export const relate = (self: Comparable, other: unknown, relation: Relation): boolean =>
  Option.match(self.compare(other), {
    onNone: () => relation === "ne",
    onSome: RELATIONS[relation],
  });

/** Render an ordering as an operator symbol. */
export const orderingSymbol = (o: Ordering): "<" | "=" | ">" =>
  o < 0 ? "<" : o > 0 ? ">" : "=";
