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

import { Response } from 'node-fetch';

/**
 * drop-box receipts and portal responses used across the submission tests
 */
export const stubs = {
	receipts: {
		sample: `<?xml version="1.0" encoding="UTF-8"?>
<RECEIPT receiptDate="2026-10-19T10:00:00.000+01:00" submissionFile="submission.xml" success="true">
  <SAMPLE accession="ERS0000001" alias="sample-1" status="PRIVATE">
    <EXT_ID accession="SAMEA0000001" type="biosample"/>
  </SAMPLE>
  <SUBMISSION accession="ERA0000001" alias="SUBMISSION-1"/>
  <MESSAGES>
    <INFO>All objects in this submission are set to private status (HOLD).</INFO>
  </MESSAGES>
  <ACTIONS>ADD</ACTIONS>
  <ACTIONS>HOLD</ACTIONS>
</RECEIPT>`,
		experiment: `<?xml version="1.0" encoding="UTF-8"?>
<RECEIPT success="true">
  <EXPERIMENT accession="ERX0000002" alias="run-1" status="PRIVATE"/>
  <SUBMISSION accession="ERA0000002" alias="SUBMISSION-2"/>
</RECEIPT>`,
		run: `<?xml version="1.0" encoding="UTF-8"?>
<RECEIPT success="true">
  <RUN accession="ERR0000003" alias="run-1" status="PRIVATE"/>
  <SUBMISSION accession="ERA0000003" alias="SUBMISSION-3"/>
</RECEIPT>`,
		release: `<?xml version="1.0" encoding="UTF-8"?>
<RECEIPT success="true">
  <SUBMISSION accession="ERA0000004" alias="SUBMISSION-4"/>
  <ACTIONS>RELEASE</ACTIONS>
</RECEIPT>`,
		withErrors: (...errors: string[]) => `<?xml version="1.0" encoding="UTF-8"?>
<RECEIPT success="false">
  <SAMPLE alias="sample-1" status="PRIVATE"/>
  <MESSAGES>
${errors.map((error) => `    <ERROR>${error}</ERROR>`).join('\n')}
    <INFO>Submission has been rolled back.</INFO>
  </MESSAGES>
</RECEIPT>`,
	},
	errors: {
		alreadyExists:
			'In sample, alias:"sample-1". The object being added already exists in the submission account with accession: "ERS0000099".',
		awaitingProcessing:
			'In run, the object ERR0000098 has already been submitted and is waiting to be processed.',
		notInUploadArea:
			'In run, alias:"run-1". Invalid data file: file "run-1.bam" does not exist in the upload area.',
		unknown: 'Invalid center name: NOT-A-CENTER.',
	},
	responses: {
		xml: (body: string, status = 200) =>
			new Response(body, { status, headers: { 'Content-Type': 'application/xml' } }),
		json: (body: unknown, status = 200) =>
			new Response(JSON.stringify(body), {
				status,
				headers: { 'Content-Type': 'application/json' },
			}),
	},
};
