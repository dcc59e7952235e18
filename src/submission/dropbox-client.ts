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

import FormData from 'form-data';
import fetch, { type RequestInit, type Response } from 'node-fetch';
import type { AppConfig, WebinCredentials } from '../config';
import { loggerFor } from '../logger';
import { classifyReceipt } from './receipt';
import {
	DocumentType,
	type SubmissionOutcome,
	SubmissionStatus,
	type SubmitOptions,
	fatal,
} from './submission-entities';
import { releaseEnvelope, submissionEnvelope } from './xml-documents';
const L = loggerFor(__filename);

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SubmissionClient {
	submit(
		documentType: DocumentType,
		documentXml: string,
		options: SubmitOptions,
	): Promise<SubmissionOutcome>;
}

export interface DropboxClientOptions {
	url: string;
	credentials: WebinCredentials;
	fetch?: FetchLike;
}

const SUBMISSION_PART = 'SUBMISSION';

const basicAuth = ({ username, password }: WebinCredentials) =>
	`Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;

/**
 * Client for the Webin drop-box. Every call posts the document together with its
 * SUBMISSION action envelope as multipart file parts.
 */
export class DropboxClient implements SubmissionClient {
	private readonly fetch: FetchLike;

	constructor(private readonly options: DropboxClientOptions) {
		this.fetch = options.fetch ?? fetch;
	}

	static forEnvironment(appConfig: AppConfig, useProduction: boolean, fetchImpl?: FetchLike) {
		return new DropboxClient({
			url: useProduction ? appConfig.dropboxUrl() : appConfig.dropboxTestUrl(),
			credentials: appConfig.webinCredentials(),
			fetch: fetchImpl,
		});
	}

	async submit(
		documentType: DocumentType,
		documentXml: string,
		options: SubmitOptions,
	): Promise<SubmissionOutcome> {
		const envelope = submissionEnvelope(options.centerName, { modify: options.modify });
		L.debug(`submitting ${documentType} to ${this.options.url}`);
		const response = await this.post({ [documentType]: documentXml, [SUBMISSION_PART]: envelope });
		if (!response) {
			return fatal();
		}
		const outcome = classifyReceipt(response.status, response.body, documentType);

		if (options.releaseImmediately && outcome.status === SubmissionStatus.OK) {
			if (outcome.accession) {
				await this.release(documentType, outcome.accession, options.centerName);
			} else {
				L.warn(`${documentType} was accepted without an accession, skipping release`);
			}
		}
		return outcome;
	}

	// only the release outcome is reported, the registration outcome stands either way
	private async release(documentType: DocumentType, accession: string, centerName: string) {
		const response = await this.post({
			[SUBMISSION_PART]: releaseEnvelope(centerName, accession),
		});
		if (!response) {
			return;
		}
		const { status } = classifyReceipt(response.status, response.body);
		if (status === SubmissionStatus.OK) {
			L.info(`[INFO] ${documentType} released successfully: ${accession}`);
		}
	}

	private async post(parts: { [name: string]: string }) {
		const form = new FormData();
		Object.entries(parts).forEach(([name, xml]) => {
			form.append(name, Buffer.from(xml, 'utf-8'), {
				filename: `${name.toLowerCase()}.xml`,
				contentType: 'application/xml',
			});
		});
		try {
			const response = await this.fetch(this.options.url, {
				method: 'POST',
				body: form,
				headers: {
					...form.getHeaders(),
					Authorization: basicAuth(this.options.credentials),
				},
			});
			return { status: response.status, body: await response.text() };
		} catch (err) {
			L.error(`request to ${this.options.url} failed`, err);
			return undefined;
		}
	}
}
