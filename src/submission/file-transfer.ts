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

import { Client } from 'basic-ftp';
import path from 'path';
import type { FtpConfig, WebinCredentials } from '../config';
import { loggerFor } from '../logger';
import { type AsyncResult, failure, success } from '../utils/results';
const L = loggerFor(__filename);

export interface FileTransfer {
	upload(localPath: string): AsyncResult<void>;
}

export type FtpClient = Pick<Client, 'access' | 'uploadFrom' | 'close'>;

/**
 * Stages a run file in the Webin upload area, stored under its basename at the root of
 * the account's namespace.
 */
export class FtpFileTransfer implements FileTransfer {
	constructor(
		private readonly ftpConfig: FtpConfig,
		private readonly credentials: WebinCredentials,
		private readonly createClient: (timeout: number) => FtpClient = (timeout) =>
			new Client(timeout),
	) {}

	async upload(localPath: string): AsyncResult<void> {
		const client = this.createClient(this.ftpConfig.timeout);
		const remoteName = path.basename(localPath);
		try {
			await client.access({
				host: this.ftpConfig.host,
				user: this.credentials.username,
				password: this.credentials.password,
			});
			L.info(`uploading ${localPath} to ${this.ftpConfig.host} as ${remoteName}`);
			await client.uploadFrom(localPath, remoteName);
			return success(undefined);
		} catch (err) {
			L.error(`[FAIL] FTP transfer timed out or failed for ${localPath}`, err);
			return failure(`FTP transfer failed for ${localPath}`, err);
		} finally {
			client.close();
		}
	}
}
