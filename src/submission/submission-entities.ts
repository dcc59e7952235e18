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

export enum DocumentType {
	SAMPLE = 'SAMPLE',
	EXPERIMENT = 'EXPERIMENT',
	RUN = 'RUN',
}

export enum SubmissionStatus {
	OK = 'OK',
	DUPLICATE = 'DUPLICATE',
	FATAL = 'FATAL',
	MISSING_UPLOAD = 'MISSING_UPLOAD',
}

// numeric codes reported by the process exit status
export const SubmissionStatusCodes: Readonly<Record<SubmissionStatus, number>> = {
	[SubmissionStatus.OK]: 0,
	[SubmissionStatus.DUPLICATE]: 1,
	[SubmissionStatus.FATAL]: -1,
	[SubmissionStatus.MISSING_UPLOAD]: -3,
};

export interface SubmissionOutcome {
	status: SubmissionStatus;
	accession?: string;
}

export const isNonFatal = (outcome: SubmissionOutcome): boolean =>
	outcome.status === SubmissionStatus.OK || outcome.status === SubmissionStatus.DUPLICATE;

export const fatal = (): SubmissionOutcome => ({ status: SubmissionStatus.FATAL });

export type Attributes = { [tag: string]: string | null | undefined };

export interface SampleRecord {
	alias: string;
	taxonId: string;
	centerName: string;
	attributes: Attributes;
}

export interface LibraryDescriptor {
	source: string;
	selection: string;
	strategy: string;
	protocol?: string;
}

export interface ExperimentRecord {
	alias: string;
	studyAccession: string;
	sampleAccession: string;
	instrument: string;
	centerName: string;
	library: LibraryDescriptor;
	attributes: Attributes;
}

export interface RunRecord {
	alias: string;
	filePath: string;
	fileType: string;
	experimentAccession: string;
	centerName: string;
	checksum: string;
}

export interface InstrumentPlatform {
	platform: string;
	model: string;
}

export interface SubmitOptions {
	centerName: string;
	releaseImmediately: boolean;
	modify: boolean;
}
