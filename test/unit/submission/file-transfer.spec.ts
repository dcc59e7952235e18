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
import sinon from 'sinon';
import { type FtpClient, FtpFileTransfer } from '../../../src/submission/file-transfer';

const ftpConfig = { host: 'ftp.test', timeout: 30000 };
const credentials = { username: 'test-user', password: 'test-secret' };

describe('ftp file transfer', () => {
	let access: sinon.SinonStub<Parameters<FtpClient['access']>, ReturnType<FtpClient['access']>>;
	let uploadFrom: sinon.SinonStub<
		Parameters<FtpClient['uploadFrom']>,
		ReturnType<FtpClient['uploadFrom']>
	>;
	let close: sinon.SinonStub<[], void>;
	let createClient: sinon.SinonStub<[number], FtpClient>;

	beforeEach(() => {
		access = sinon.stub();
		uploadFrom = sinon.stub();
		close = sinon.stub<[], void>();
		createClient = sinon.stub<[number], FtpClient>().returns({ access, uploadFrom, close });
	});

	it('should store the file under its basename', async () => {
		access.resolves({ code: 230, message: '230 Login successful.' });
		uploadFrom.resolves({ code: 226, message: '226 Transfer complete.' });
		const transfer = new FtpFileTransfer(ftpConfig, credentials, createClient);

		const result = await transfer.upload('/data/staging/run-1.bam');

		chai.expect(result.success).to.be.true;
		chai.expect(createClient.calledOnceWith(30000)).to.be.true;
		chai
			.expect(access.firstCall.args[0])
			.to.deep.eq({ host: 'ftp.test', user: 'test-user', password: 'test-secret' });
		chai.expect(uploadFrom.calledOnceWith('/data/staging/run-1.bam', 'run-1.bam')).to.be.true;
		chai.expect(close.calledOnce).to.be.true;
	});

	it('should report failures and still close the connection', async () => {
		access.rejects(new Error('Timeout (control socket)'));
		const transfer = new FtpFileTransfer(ftpConfig, credentials, createClient);

		const result = await transfer.upload('/data/staging/run-1.bam');

		chai.expect(result).to.deep.include({
			success: false,
			message: 'FTP transfer failed for /data/staging/run-1.bam',
		});
		chai.expect(uploadFrom.called).to.be.false;
		chai.expect(close.calledOnce).to.be.true;
	});
});
