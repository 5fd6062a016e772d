// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the character level. Uses `Array.from()` throughout
 * for correct Unicode surrogate pair handling (string indexing does not).
 * All multi argument functions are curried data-last for `pipe()` composition.
 */

import { type CharPred, isDigit } from "./char";

export const chars = (s: string): readonly string[] => Array.from(s);

/** Lift a `CharPred` to operate on an entire string (every character must satisfy). */
export const all =
	(pred: CharPred) =>
	(s: string): boolean =>
		chars(s).every(pred);

/** Non-empty and made only of ASCII digits. */
export const isDigits = (s: string): boolean => s.length > 0 && all(isDigit)(s);

/**
 * Break a token into maximal runs of digits and non-digits.
 *
 * @example
 * digitRuns("rc12") // ["rc", "12"]
 * digitRuns("1a")   // ["1", "a"]
 */
export const digitRuns = (s: string): readonly string[] =>
	chars(s).reduce<string[]>((runs, c) => {
		const prev = runs.at(-1);
		return prev !== undefined && isDigit(prev.charAt(prev.length - 1)) === isDigit(c)
			? [...runs.slice(0, -1), `${prev}${c}`]
			: [...runs, c];
	}, []);
