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

import { type RegistrationResult, RegistrationStep } from './registration';
import { SubmissionStatusCodes } from './submission-entities';

export const GENERIC_FAILURE_EXIT_CODE = 2;

export interface SummaryFields {
	success: boolean;
	productionReady: boolean;
	sampleName: string;
	runName?: string;
	filePath?: string;
	studyAccession: string;
	sampleAccession?: string;
	experimentAccession?: string;
	runAccession?: string;
}

const orNone = (value: string | undefined): string =>
	value === undefined || value === '' ? 'None' : value;

const flag = (value: boolean): string => (value ? '1' : '0');

export const summaryLine = (fields: SummaryFields): string =>
	[
		flag(fields.success),
		flag(fields.productionReady),
		fields.sampleName,
		orNone(fields.runName),
		orNone(fields.filePath),
		fields.studyAccession,
		orNone(fields.sampleAccession),
		orNone(fields.experimentAccession),
		orNone(fields.runAccession),
	].join(' ');

/**
 * 0 on success. A failed run registration exits with the magnitude of its outcome code
 * (1 for a rejected submission, 3 when the file is missing from the upload area); every
 * other failure exits with 2.
 */
export const exitCodeFor = (result: RegistrationResult): number => {
	if (result.success) {
		return 0;
	}
	if (result.lastStep === RegistrationStep.REGISTER_RUN && result.run) {
		const code = SubmissionStatusCodes[result.run.status];
		if (code < 0) {
			return Math.abs(code);
		}
	}
	return GENERIC_FAILURE_EXIT_CODE;
};
