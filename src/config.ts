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

export let config: ConfigManager;

export const DEFAULT_DROPBOX_URL = 'https://www.ebi.ac.uk/ena/submit/drop-box/submit/';
export const DEFAULT_DROPBOX_TEST_URL = 'https://wwwdev.ebi.ac.uk/ena/submit/drop-box/submit/';
export const DEFAULT_PORTAL_SEARCH_URL = 'https://www.ebi.ac.uk/ena/portal/api/search';
export const DEFAULT_FTP_HOST = 'webin.ebi.ac.uk';
export const DEFAULT_FTP_TIMEOUT_MILLIS = 30 * 1000;
export const DEFAULT_LOG_LEVEL = 'info';

export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigurationError';
	}
}

export const initConfigs = (configs: AppConfig) => {
	config = new ConfigManager(configs);
	return configs;
};

export interface AppConfig {
	webinCredentials(): WebinCredentials;
	dropboxUrl(): string;
	dropboxTestUrl(): string;
	portalSearchUrl(): string;
	ftpProperties(): FtpConfig;
	logLevel(): string;
}

class ConfigManager {
	constructor(private impl: AppConfig) {}
	getConfig(): AppConfig {
		return this.impl;
	}
}

export interface WebinCredentials {
	username: string;
	password: string;
}

export interface FtpConfig {
	host: string;
	timeout: number;
}

/**
 * Builds the configuration from environment variables.
 * Credentials are checked lazily so that `--help` works without them.
 */
export const envConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
	webinCredentials(): WebinCredentials {
		const username = env.WEBIN_USER || '';
		const password = env.WEBIN_PASS || '';
		if (username === '' || password === '') {
			throw new ConfigurationError('WEBIN_USER and WEBIN_PASS must be set');
		}
		return { username, password };
	},
	dropboxUrl(): string {
		return env.ENA_DROPBOX_URL || DEFAULT_DROPBOX_URL;
	},
	dropboxTestUrl(): string {
		return env.ENA_DROPBOX_TEST_URL || DEFAULT_DROPBOX_TEST_URL;
	},
	portalSearchUrl(): string {
		return env.ENA_PORTAL_SEARCH_URL || DEFAULT_PORTAL_SEARCH_URL;
	},
	ftpProperties(): FtpConfig {
		return {
			host: env.ENA_FTP_HOST || DEFAULT_FTP_HOST,
			timeout: Number(env.ENA_FTP_TIMEOUT_MILLIS) || DEFAULT_FTP_TIMEOUT_MILLIS,
		};
	},
	logLevel(): string {
		return env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
	},
});
