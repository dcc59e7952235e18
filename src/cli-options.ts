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

import { Command } from 'commander';
import _ from 'lodash';
import { z as zod } from 'zod';
import type { RegistrationRequest } from './submission/registration';
import { parseKeyValuePairs } from './utils';

export class InvalidOptionsError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'InvalidOptionsError';
	}
}

const collect = (value: string, previous: string[]) => previous.concat([value]);

export const buildProgram = (): Command =>
	new Command()
		.name('ena-register')
		.description(
			'Register a sample, experiment and run with the ENA Webin drop-box and upload the run file.',
		)
		.option('--my-data-is-ready', 'submit to the production service instead of the test service')
		.option('--no-ftp', 'skip the FTP upload, the file is already in the upload area')
		.option('--sample-only', 'register the sample and stop')
		.option('--modify', 'modify the existing sample instead of adding it')
		.requiredOption('--study-accession <accession>', 'study (project) accession')
		.requiredOption('--sample-name <name>', 'sample alias')
		.requiredOption('--sample-center-name <name>', 'center name for the sample')
		.requiredOption('--sample-taxon <taxonId>', 'NCBI taxon id of the sample')
		.option('--sample-attr <tag=value>', 'sample attribute, repeatable', collect, [])
		.option('--experiment-attr <tag=value>', 'experiment attribute, repeatable', collect, [])
		.option('--run-name <name>', 'run alias, also used as the experiment alias')
		.option('--run-file-path <path>', 'local path of the run file')
		.option('--run-file-type <type>', 'archive file type of the run file', 'bam')
		.option('--run-center-name <name>', 'center name for the experiment and run')
		.option('--run-instrument <instrument>', 'sequencing instrument, e.g. Illumina_MiSeq')
		.option('--run-lib-source <source>', 'library source')
		.option('--run-lib-selection <selection>', 'library selection')
		.option('--run-lib-strategy <strategy>', 'library strategy')
		.option('--run-lib-protocol <protocol>', 'library construction protocol', '')
		.allowExcessArguments(false)
		.exitOverride();

const nonEmpty = zod.string().min(1);
const attributePair = zod.string().regex(/^[^=]+=/, 'expected tag=value');

export const CliOptions = zod.object({
	myDataIsReady: zod.boolean().default(false),
	ftp: zod.boolean().default(true),
	sampleOnly: zod.boolean().default(false),
	modify: zod.boolean().default(false),
	studyAccession: nonEmpty,
	sampleName: nonEmpty,
	sampleCenterName: nonEmpty,
	sampleTaxon: nonEmpty,
	sampleAttr: zod.array(attributePair).default([]),
	experimentAttr: zod.array(attributePair).default([]),
	runName: zod.string().optional(),
	runFilePath: zod.string().optional(),
	runFileType: zod.string().default('bam'),
	runCenterName: zod.string().optional(),
	runInstrument: zod.string().optional(),
	runLibSource: zod.string().optional(),
	runLibSelection: zod.string().optional(),
	runLibStrategy: zod.string().optional(),
	runLibProtocol: zod.string().default(''),
});
export type CliOptions = zod.infer<typeof CliOptions>;

// run fields only become mandatory once the experiment and run are registered too
const RunOptions = zod.object({
	runName: nonEmpty,
	runFilePath: nonEmpty,
	runFileType: nonEmpty,
	runCenterName: nonEmpty,
	runInstrument: nonEmpty,
	runLibSource: nonEmpty,
	runLibSelection: nonEmpty,
	runLibStrategy: nonEmpty,
});

const flagNames = (error: zod.ZodError) =>
	_.uniq(error.issues.map((issue) => `--${_.kebabCase(String(issue.path[0]))}`)).join(', ');

export const parseCliOptions = (values: unknown): CliOptions => {
	const result = CliOptions.safeParse(values);
	if (!result.success) {
		throw new InvalidOptionsError(`invalid options: ${flagNames(result.error)}`);
	}
	return result.data;
};

export const toRegistrationRequest = (options: CliOptions): RegistrationRequest => {
	const base = {
		studyAccession: options.studyAccession,
		modify: options.modify,
		sample: {
			name: options.sampleName,
			centerName: options.sampleCenterName,
			taxonId: options.sampleTaxon,
			attributes: parseKeyValuePairs(options.sampleAttr),
		},
	};
	if (options.sampleOnly) {
		return { ...base, sampleOnly: true };
	}

	const run = RunOptions.safeParse(options);
	if (!run.success) {
		throw new InvalidOptionsError(
			`${flagNames(run.error)} required unless --sample-only is given`,
		);
	}
	return {
		...base,
		sampleOnly: false,
		upload: options.ftp,
		run: {
			name: run.data.runName,
			filePath: run.data.runFilePath,
			fileType: run.data.runFileType,
			centerName: run.data.runCenterName,
			instrument: run.data.runInstrument,
			librarySource: run.data.runLibSource,
			librarySelection: run.data.runLibSelection,
			libraryStrategy: run.data.runLibStrategy,
			libraryProtocol: options.runLibProtocol,
			experimentAttributes: parseKeyValuePairs(options.experimentAttr),
		},
	};
};
