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

import chai from 'chai';
import FormData from 'form-data';
import sinon from 'sinon';
import { type AppConfig, envConfig } from '../../../src/config';
import { DropboxClient, type FetchLike } from '../../../src/submission/dropbox-client';
import { DocumentType, SubmissionStatus } from '../../../src/submission/submission-entities';
import { stubs } from './stubs';

const DROPBOX_URL = 'http://dropbox.test/submit/';
const credentials = { username: 'test-user', password: 'test-secret' };

const bodyOf = (call: sinon.SinonSpyCall<Parameters<FetchLike>>): string => {
	const body = call.args[1]?.body;
	if (!(body instanceof FormData)) {
		return chai.assert.fail('expected a multipart body');
	}
	return body.getBuffer().toString('utf-8');
};

describe('drop-box client', () => {
	let fetchStub: sinon.SinonStub<Parameters<FetchLike>, ReturnType<FetchLike>>;
	let client: DropboxClient;

	beforeEach(() => {
		fetchStub = sinon.stub<Parameters<FetchLike>, ReturnType<FetchLike>>();
		client = new DropboxClient({ url: DROPBOX_URL, credentials, fetch: fetchStub });
	});

	it('should post the document and its envelope with basic auth', async () => {
		fetchStub.resolves(stubs.responses.xml(stubs.receipts.sample));

		await client.submit(DocumentType.SAMPLE, '<SAMPLE_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: false,
			modify: false,
		});

		chai.expect(fetchStub.calledOnce).to.be.true;
		const [url, init] = fetchStub.firstCall.args;
		chai.expect(url).to.eq(DROPBOX_URL);
		chai.expect(init?.method).to.eq('POST');
		chai.expect(init?.headers).to.include({
			Authorization: `Basic ${Buffer.from('test-user:test-secret').toString('base64')}`,
		});
		const body = bodyOf(fetchStub.firstCall);
		chai.expect(body).to.include('name="SAMPLE"; filename="sample.xml"');
		chai.expect(body).to.include('<SAMPLE_SET/>');
		chai.expect(body).to.include('name="SUBMISSION"; filename="submission.xml"');
		chai.expect(body).to.include('<ADD/>');
		chai.expect(body).to.include('<HOLD HoldUntilDate=');
	});

	it('should release an accepted record straight away', async () => {
		fetchStub.onFirstCall().resolves(stubs.responses.xml(stubs.receipts.sample));
		fetchStub.onSecondCall().resolves(stubs.responses.xml(stubs.receipts.release));

		const outcome = await client.submit(DocumentType.SAMPLE, '<SAMPLE_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: true,
			modify: false,
		});

		chai.expect(outcome).to.deep.eq({ status: SubmissionStatus.OK, accession: 'ERS0000001' });
		chai.expect(fetchStub.calledTwice).to.be.true;
		const release = bodyOf(fetchStub.secondCall);
		chai.expect(release).to.include('<RELEASE target="ERS0000001"/>');
		chai.expect(release).not.to.include('name="SAMPLE"');
	});

	it('should keep the registration outcome when the release is rejected', async () => {
		fetchStub.onFirstCall().resolves(stubs.responses.xml(stubs.receipts.run));
		fetchStub.onSecondCall().resolves(stubs.responses.xml('Internal Server Error', 500));

		const outcome = await client.submit(DocumentType.RUN, '<RUN_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: true,
			modify: false,
		});

		chai.expect(outcome).to.deep.eq({ status: SubmissionStatus.OK, accession: 'ERR0000003' });
		chai.expect(fetchStub.calledTwice).to.be.true;
	});

	it('should not release duplicates', async () => {
		fetchStub.resolves(
			stubs.responses.xml(stubs.receipts.withErrors(stubs.errors.alreadyExists)),
		);

		const outcome = await client.submit(DocumentType.SAMPLE, '<SAMPLE_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: true,
			modify: false,
		});

		chai.expect(outcome).to.deep.eq({
			status: SubmissionStatus.DUPLICATE,
			accession: 'ERS0000099',
		});
		chai.expect(fetchStub.calledOnce).to.be.true;
	});

	it('should not release an accepted record without an accession', async () => {
		fetchStub.resolves(stubs.responses.xml(stubs.receipts.release));

		const outcome = await client.submit(DocumentType.SAMPLE, '<SAMPLE_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: true,
			modify: false,
		});

		chai.expect(outcome).to.deep.eq({ status: SubmissionStatus.OK });
		chai.expect(fetchStub.calledOnce).to.be.true;
	});

	it('should send a single MODIFY action in modify mode', async () => {
		fetchStub.resolves(stubs.responses.xml(stubs.receipts.sample));

		await client.submit(DocumentType.SAMPLE, '<SAMPLE_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: false,
			modify: true,
		});

		const body = bodyOf(fetchStub.firstCall);
		chai.expect(body).to.include('<MODIFY/>');
		chai.expect(body).not.to.include('<ADD/>');
		chai.expect(body).not.to.include('HOLD');
	});

	it('should turn transport failures into fatal outcomes', async () => {
		fetchStub.rejects(new Error('socket hang up'));

		const outcome = await client.submit(DocumentType.EXPERIMENT, '<EXPERIMENT_SET/>', {
			centerName: 'TEST-CENTER',
			releaseImmediately: true,
			modify: false,
		});

		chai.expect(outcome).to.deep.eq({ status: SubmissionStatus.FATAL });
	});

	describe('forEnvironment', () => {
		const appConfig: AppConfig = envConfig({
			WEBIN_USER: 'test-user',
			WEBIN_PASS: 'test-secret',
			ENA_DROPBOX_URL: 'http://production.test/submit/',
			ENA_DROPBOX_TEST_URL: 'http://sandbox.test/submit/',
		});

		it('should pick the endpoint for the environment', async () => {
			fetchStub.callsFake(async () => stubs.responses.xml(stubs.receipts.release));

			await DropboxClient.forEnvironment(appConfig, true, fetchStub).submit(
				DocumentType.SAMPLE,
				'<SAMPLE_SET/>',
				{ centerName: 'TEST-CENTER', releaseImmediately: false, modify: false },
			);
			await DropboxClient.forEnvironment(appConfig, false, fetchStub).submit(
				DocumentType.SAMPLE,
				'<SAMPLE_SET/>',
				{ centerName: 'TEST-CENTER', releaseImmediately: false, modify: false },
			);

			chai.expect(fetchStub.firstCall.args[0]).to.eq('http://production.test/submit/');
			chai.expect(fetchStub.secondCall.args[0]).to.eq('http://sandbox.test/submit/');
		});
	});
});
