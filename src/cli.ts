#!/usr/bin/env node
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

import { CommanderError } from 'commander';
import dotenv from 'dotenv';
import { type CliOptions, buildProgram, parseCliOptions, toRegistrationRequest } from './cli-options';
import { config, envConfig, initConfigs } from './config';
import { loggerFor, setLogLevel } from './logger';
import { DropboxClient, type FetchLike } from './submission/dropbox-client';
import { type FileTransfer, FtpFileTransfer } from './submission/file-transfer';
import { PortalSampleSearch } from './submission/sample-search';
import {
	type RegistrationRequest,
	type RegistrationResult,
	RegistrationService,
} from './submission/registration';
import { GENERIC_FAILURE_EXIT_CODE, exitCodeFor, summaryLine } from './submission/summary';
import { md5File } from './utils';
const L = loggerFor(__filename);

export interface CliEnvironment {
	env: NodeJS.ProcessEnv;
	write: (line: string) => void;
	fetch?: FetchLike;
	fileTransfer?: FileTransfer;
}

const defaultEnvironment = (): CliEnvironment => ({
	env: process.env,
	write: (line) => process.stdout.write(line),
});

/**
 * Runs one registration and resolves to the process exit code. The summary line is
 * written once the registration has been attempted, whatever its outcome.
 */
export const run = async (
	argv: string[],
	environment: CliEnvironment = defaultEnvironment(),
): Promise<number> => {
	const program = buildProgram();
	try {
		program.parse(argv);
	} catch (err) {
		if (err instanceof CommanderError) {
			return err.exitCode === 0 ? 0 : GENERIC_FAILURE_EXIT_CODE;
		}
		throw err;
	}

	let options: CliOptions;
	let request: RegistrationRequest;
	try {
		options = parseCliOptions(program.opts());
		request = toRegistrationRequest(options);
	} catch (err) {
		L.error(err instanceof Error ? err.message : 'invalid options', err);
		return GENERIC_FAILURE_EXIT_CODE;
	}

	initConfigs(envConfig(environment.env));
	const appConfig = config.getConfig();
	setLogLevel(appConfig.logLevel());

	let result: RegistrationResult | undefined;
	try {
		const credentials = appConfig.webinCredentials();
		const service = new RegistrationService({
			sampleSearch: new PortalSampleSearch(appConfig.portalSearchUrl(), environment.fetch),
			submissionClient: DropboxClient.forEnvironment(
				appConfig,
				options.myDataIsReady,
				environment.fetch,
			),
			fileTransfer:
				environment.fileTransfer ?? new FtpFileTransfer(appConfig.ftpProperties(), credentials),
			checksum: md5File,
		});
		L.profile('registration');
		result = await service.register(request);
		L.profile('registration');
	} catch (err) {
		L.error('registration failed', err);
	}

	environment.write(
		summaryLine({
			success: result?.success ?? false,
			productionReady: options.myDataIsReady,
			sampleName: options.sampleName,
			runName: options.runName,
			filePath: options.runFilePath,
			studyAccession: options.studyAccession,
			sampleAccession: result?.sample.accession,
			experimentAccession: result?.experiment?.accession,
			runAccession: result?.run?.accession,
		}) + '\n',
	);
	return result ? exitCodeFor(result) : GENERIC_FAILURE_EXIT_CODE;
};

if (require.main === module) {
	if (process.env.NODE_ENV !== 'PRODUCTION') {
		dotenv.config();
	}
	run(process.argv)
		.then((code) => process.exit(code))
		.catch((err) => {
			L.error('unexpected failure', err);
			process.exit(GENERIC_FAILURE_EXIT_CODE);
		});
}
