/*
 * Copyright (c) 2020 The Ontario Institute for Cancer Research. All rights reserved
 *
 * This program and the accompanying materials are made available under the terms of
 * the GNU Affero General Public License v3.0. You should have received a copy of the
 * GNU Affero General Public License along with this program.
 *  If not, see <http://www.gnu.org/licenses/>.
 *
 * THIS SOFTWARE IS PROVIDED BY THE COPYRIGHT HOLDERS AND CONTRIBUTORS "AS IS" AND ANY
 * EXPRESS OR IMPLIED WARRANTIES, INCLUDING, BUT NOT LIMITED TO, THE IMPLIED WARRANTIES
 * OF MERCHANTABILITY AND FITNESS FOR A PARTICULAR PURPOSE ARE DISCLAIMED. IN NO EVENT
 * SHALL THE COPYRIGHT HOLDER OR CONTRIBUTORS BE LIABLE FOR ANY DIRECT, INDIRECT,
 * INCIDENTAL, SPECIAL, EXEMPLARY, OR CONSEQUENTIAL DAMAGES (INCLUDING, BUT NOT LIMITED
 * TO, PROCUREMENT OF SUBSTITUTE GOODS OR SERVICES; LOSS OF USE, DATA, OR PROFITS;
 * OR BUSINESS INTERRUPTION) HOWEVER CAUSED AND ON ANY THEORY OF LIABILITY, WHETHER
 * IN CONTRACT, STRICT LIABILITY, OR TORT (INCLUDING NEGLIGENCE OR OTHERWISE) ARISING IN
 * ANY WAY OUT OF THE USE OF THIS SOFTWARE, EVEN IF ADVISED OF THE POSSIBILITY OF SUCH DAMAGE.
 */

import deepFreeze from 'deep-freeze';
import { z as zod } from 'zod';
import instrumentModels from '../resources/instrument-models.json';
import type { InstrumentPlatform } from './submission-entities';

// platform and model enumerations follow the archive's SRA.common.xsd
const InstrumentTable = zod.array(
	zod.object({
		platform: zod.string(),
		models: zod.array(zod.tuple([zod.string(), zod.string()])),
	}),
);

const INSTRUMENT_TABLE = deepFreeze(InstrumentTable.parse(instrumentModels));

const LIBRARY_STRATEGY_EXCEPTIONS: Readonly<{ [text: string]: string }> = deepFreeze({
	TARGETED_CAPTURE: 'Targeted-Capture',
});

export const normalizeLibraryTerm = (text: string): string => text.replace(/_/g, ' ');

/**
 * Maps free-text instrument names onto the archive's platform and model enumerations.
 * The first table entry contained in the text wins, so specific models are listed before
 * the catch-all family names. Returns undefined when nothing matches.
 */
export const normalizeInstrument = (instrumentName: string): InstrumentPlatform | undefined => {
	const text = normalizeLibraryTerm(instrumentName).toLowerCase();
	for (const { platform, models } of INSTRUMENT_TABLE) {
		const match = models.find(([key]) => text.includes(key.toLowerCase()));
		if (match) {
			return { platform, model: match[1] };
		}
	}
	return undefined;
};

export const normalizeLibraryStrategy = (strategy: string): string =>
	LIBRARY_STRATEGY_EXCEPTIONS[strategy] ?? strategy;
