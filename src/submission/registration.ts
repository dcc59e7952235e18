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

import { loggerFor } from '../logger';
import type { SubmissionClient } from './dropbox-client';
import type { FileTransfer } from './file-transfer';
import type { SampleSearch } from './sample-search';
import {
	type Attributes,
	DocumentType,
	type SubmissionOutcome,
	SubmissionStatus,
	fatal,
	isNonFatal,
} from './submission-entities';
import {
	normalizeLibraryStrategy,
	normalizeLibraryTerm,
} from './vocabulary';
import { experimentDocument, runDocument, sampleDocument } from './xml-documents';
const L = loggerFor(__filename);

export enum RegistrationStep {
	CHECK_EXISTING = 'CHECK_EXISTING',
	REGISTER_SAMPLE = 'REGISTER_SAMPLE',
	REGISTER_EXPERIMENT = 'REGISTER_EXPERIMENT',
	REGISTER_RUN = 'REGISTER_RUN',
}

export interface SampleRequest {
	name: string;
	centerName: string;
	taxonId: string;
	attributes: Attributes;
}

export interface RunRequest {
	name: string;
	filePath: string;
	fileType: string;
	centerName: string;
	instrument: string;
	librarySource: string;
	librarySelection: string;
	libraryStrategy: string;
	libraryProtocol?: string;
	experimentAttributes: Attributes;
}

interface BaseRegistrationRequest {
	studyAccession: string;
	sample: SampleRequest;
	modify: boolean;
}

export type RegistrationRequest = BaseRegistrationRequest &
	(
		| { sampleOnly: true }
		| {
				sampleOnly: false;
				// false when the file was staged in the upload area some other way
				upload: boolean;
				run: RunRequest;
		  }
	);

export interface RegistrationResult {
	success: boolean;
	lastStep: RegistrationStep;
	sample: SubmissionOutcome;
	experiment?: SubmissionOutcome;
	run?: SubmissionOutcome;
}

export interface RegistrationDependencies {
	sampleSearch: SampleSearch;
	submissionClient: SubmissionClient;
	fileTransfer: FileTransfer;
	checksum: (filePath: string) => Promise<string>;
}

const hasAccession = (
	outcome: SubmissionOutcome,
): outcome is SubmissionOutcome & { accession: string } =>
	isNonFatal(outcome) && outcome.accession !== undefined && outcome.accession !== '';

/**
 * Registers a sample, then an experiment describing the library, then the run carrying
 * the data file. Each step needs the accession of the one before it, so the first
 * fatal outcome ends the registration. Records registered before the failure stay in
 * the archive and are picked up again by the existing-sample lookup on the next attempt.
 */
export class RegistrationService {
	constructor(private readonly deps: RegistrationDependencies) {}

	async register(request: RegistrationRequest): Promise<RegistrationResult> {
		const sample = await this.registerSample(request);
		if (!hasAccession(sample)) {
			if (isNonFatal(sample)) {
				L.warn(`sample ${request.sample.name} was accepted but no accession was returned`);
			}
			return { success: false, lastStep: RegistrationStep.REGISTER_SAMPLE, sample };
		}
		if (request.sampleOnly) {
			return { success: true, lastStep: RegistrationStep.REGISTER_SAMPLE, sample };
		}

		const experiment = await this.registerExperiment(
			request.run,
			request.studyAccession,
			sample.accession,
		);
		if (!hasAccession(experiment)) {
			return {
				success: false,
				lastStep: RegistrationStep.REGISTER_EXPERIMENT,
				sample,
				experiment,
			};
		}

		const run = await this.registerRun(request.run, experiment.accession, request.upload);
		return {
			success: hasAccession(run),
			lastStep: RegistrationStep.REGISTER_RUN,
			sample,
			experiment,
			run,
		};
	}

	private async registerSample(request: RegistrationRequest): Promise<SubmissionOutcome> {
		const { studyAccession, sample, modify } = request;

		L.debug(`${RegistrationStep.CHECK_EXISTING} ${studyAccession}/${sample.name}`);
		const existing = await this.deps.sampleSearch.findSamples(studyAccession, sample.name);
		if (existing.length > 0) {
			const accession = existing[0].secondary_sample_accession;
			L.info(`[SKIP] Accession ${accession} already exists. Moving on...`);
			return { status: SubmissionStatus.DUPLICATE, accession };
		}

		L.debug(`${RegistrationStep.REGISTER_SAMPLE} ${sample.name}`);
		const xml = sampleDocument({
			alias: sample.name,
			taxonId: sample.taxonId,
			centerName: sample.centerName,
			attributes: sample.attributes,
		});
		return this.deps.submissionClient.submit(DocumentType.SAMPLE, xml, {
			centerName: sample.centerName,
			releaseImmediately: !modify,
			modify,
		});
	}

	private async registerExperiment(
		run: RunRequest,
		studyAccession: string,
		sampleAccession: string,
	): Promise<SubmissionOutcome> {
		L.debug(`${RegistrationStep.REGISTER_EXPERIMENT} ${run.name}`);
		const xml = experimentDocument({
			alias: run.name,
			studyAccession,
			sampleAccession,
			instrument: normalizeLibraryTerm(run.instrument),
			centerName: run.centerName,
			library: {
				source: normalizeLibraryTerm(run.librarySource),
				selection: normalizeLibraryTerm(run.librarySelection),
				strategy: normalizeLibraryStrategy(run.libraryStrategy),
				protocol: run.libraryProtocol,
			},
			attributes: run.experimentAttributes,
		});
		return this.deps.submissionClient.submit(DocumentType.EXPERIMENT, xml, {
			centerName: run.centerName,
			releaseImmediately: true,
			modify: false,
		});
	}

	private async registerRun(
		run: RunRequest,
		experimentAccession: string,
		upload: boolean,
	): Promise<SubmissionOutcome> {
		L.debug(`${RegistrationStep.REGISTER_RUN} ${run.name}`);
		if (upload) {
			const uploaded = await this.deps.fileTransfer.upload(run.filePath);
			if (!uploaded.success) {
				return fatal();
			}
		}

		let checksum: string;
		try {
			checksum = await this.deps.checksum(run.filePath);
		} catch (err) {
			L.error(`[FAIL] could not compute the checksum of ${run.filePath}`, err);
			return fatal();
		}

		const xml = runDocument({
			alias: run.name,
			filePath: run.filePath,
			fileType: run.fileType,
			experimentAccession,
			centerName: run.centerName,
			checksum,
		});
		return this.deps.submissionClient.submit(DocumentType.RUN, xml, {
			centerName: run.centerName,
			releaseImmediately: true,
			modify: false,
		});
	}
}
