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

import fetch from 'node-fetch';
import { z as zod } from 'zod';
import { loggerFor } from '../logger';
import type { FetchLike } from './dropbox-client';
const L = loggerFor(__filename);

export const SampleSearchHit = zod.object({
	sample_accession: zod.string().optional(),
	secondary_sample_accession: zod.string(),
	sample_alias: zod.string().optional(),
	sample_description: zod.string().optional(),
});
export type SampleSearchHit = zod.infer<typeof SampleSearchHit>;

const SampleSearchResponse = zod.array(SampleSearchHit);

const SEARCH_FIELDS = [
	'sample_accession',
	'sample_description',
	'sample_alias',
	'secondary_sample_accession',
];

export class ArchiveSearchError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ArchiveSearchError';
	}
}

export interface SampleSearch {
	findSamples(studyAccession: string, sampleAlias: string): Promise<SampleSearchHit[]>;
}

export const sampleSearchUrl = (baseUrl: string, studyAccession: string, sampleAlias: string) => {
	const params = new URLSearchParams({
		query: `study_accession="${studyAccession}" AND sample_alias="${sampleAlias}"`,
		result: 'sample',
		fields: SEARCH_FIELDS.join(','),
		limit: '0',
		download: 'false',
		format: 'json',
	});
	return `${baseUrl}?${params.toString()}`;
};

/**
 * Read-only lookup against the portal search API, used to find samples that were
 * registered under a study by an earlier invocation.
 */
export class PortalSampleSearch implements SampleSearch {
	private readonly fetch: FetchLike;

	constructor(private readonly baseUrl: string, fetchImpl?: FetchLike) {
		this.fetch = fetchImpl ?? fetch;
	}

	async findSamples(studyAccession: string, sampleAlias: string): Promise<SampleSearchHit[]> {
		const url = sampleSearchUrl(this.baseUrl, studyAccession, sampleAlias);
		L.debug(`searching for sample ${sampleAlias} in ${studyAccession}`);
		const response = await this.fetch(url);
		const text = await response.text();
		if (response.status === 204 || (response.ok && text.trim() === '')) {
			return [];
		}
		if (!response.ok) {
			throw new ArchiveSearchError(`sample search responded with HTTP ${response.status}: ${text}`);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			L.error(`sample search returned a body that is not JSON: ${text}`, err);
			throw new ArchiveSearchError('sample search returned a body that is not JSON');
		}
		const result = SampleSearchResponse.safeParse(json);
		if (!result.success) {
			throw new ArchiveSearchError(`unexpected sample search response: ${result.error.message}`);
		}
		return result.data;
	}
}
