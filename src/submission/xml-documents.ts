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

import { XMLBuilder } from 'fast-xml-parser';
import _ from 'lodash';
import path from 'path';
import type {
	Attributes,
	ExperimentRecord,
	RunRecord,
	SampleRecord,
} from './submission-entities';
import { normalizeInstrument } from './vocabulary';

type XmlNode = { [name: string]: XmlValue };
type XmlValue = string | XmlNode | XmlNode[];

// text and attribute values are entity-escaped by the builder
const builder = new XMLBuilder({
	ignoreAttributes: false,
	attributeNamePrefix: '@_',
	format: true,
	indentBy: '  ',
	suppressEmptyNode: true,
	suppressBooleanAttributes: false,
	processEntities: true,
});

const build = (root: XmlNode): string => builder.build(root);

const attributeList = (attributes: Attributes): XmlNode[] =>
	Object.entries(attributes)
		.filter((entry): entry is [string, string] => !_.isNil(entry[1]) && entry[1].length > 0)
		.map(([tag, value]) => ({ TAG: tag, VALUE: value }));

export const todayUtc = (now: Date = new Date()): string => now.toISOString().substring(0, 10);

export const sampleDocument = (sample: SampleRecord): string =>
	build({
		SAMPLE_SET: {
			SAMPLE: {
				'@_alias': sample.alias,
				'@_center_name': sample.centerName,
				TITLE: sample.alias,
				SAMPLE_NAME: {
					TAXON_ID: sample.taxonId,
				},
				SAMPLE_ATTRIBUTES: {
					SAMPLE_ATTRIBUTE: attributeList(sample.attributes),
				},
			},
		},
	});

const platformNode = (instrument: string): XmlNode | string => {
	const normalized = normalizeInstrument(instrument);
	if (!normalized) {
		return '';
	}
	return { [normalized.platform]: { INSTRUMENT_MODEL: normalized.model } };
};

export const experimentDocument = (experiment: ExperimentRecord): string => {
	const { library } = experiment;
	const libraryDescriptor: XmlNode = {
		LIBRARY_NAME: '',
		LIBRARY_STRATEGY: library.strategy,
		LIBRARY_SOURCE: library.source,
		LIBRARY_SELECTION: library.selection,
		LIBRARY_LAYOUT: { SINGLE: '' },
	};
	if (library.protocol) {
		libraryDescriptor.LIBRARY_CONSTRUCTION_PROTOCOL = library.protocol;
	}
	return build({
		EXPERIMENT_SET: {
			EXPERIMENT: {
				'@_alias': experiment.alias,
				'@_center_name': experiment.centerName,
				TITLE: experiment.alias,
				STUDY_REF: { '@_accession': experiment.studyAccession },
				DESIGN: {
					DESIGN_DESCRIPTION: '',
					SAMPLE_DESCRIPTOR: { '@_accession': experiment.sampleAccession },
					LIBRARY_DESCRIPTOR: libraryDescriptor,
				},
				PLATFORM: platformNode(experiment.instrument),
				EXPERIMENT_ATTRIBUTES: {
					EXPERIMENT_ATTRIBUTE: attributeList(experiment.attributes),
				},
			},
		},
	});
};

export const runDocument = (run: RunRecord): string =>
	build({
		RUN_SET: {
			RUN: {
				'@_alias': run.alias,
				'@_center_name': run.centerName,
				EXPERIMENT_REF: { '@_accession': run.experimentAccession },
				DATA_BLOCK: {
					FILES: {
						FILE: {
							'@_filename': path.basename(run.filePath),
							'@_filetype': run.fileType,
							'@_checksum_method': 'MD5',
							'@_checksum': run.checksum,
						},
					},
				},
			},
		},
	});

export interface EnvelopeOptions {
	modify: boolean;
	holdUntil?: Date;
}

/**
 * Wraps a document submission in its action envelope. New records are added and held
 * private until the given date (today by default), modifications carry a single MODIFY.
 */
export const submissionEnvelope = (centerName: string, options: EnvelopeOptions): string => {
	const actions: XmlNode[] = options.modify
		? [{ MODIFY: '' }]
		: [{ ADD: '' }, { HOLD: { '@_HoldUntilDate': todayUtc(options.holdUntil) } }];
	return build({
		SUBMISSION: {
			'@_center_name': centerName,
			ACTIONS: { ACTION: actions },
		},
	});
};

export const releaseEnvelope = (centerName: string, accession: string): string =>
	build({
		SUBMISSION: {
			'@_center_name': centerName,
			ACTIONS: {
				ACTION: [{ RELEASE: { '@_target': accession } }],
			},
		},
	});
