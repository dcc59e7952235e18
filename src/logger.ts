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

import path from 'path';
import winston from 'winston';
const { format } = winston;
const { combine, timestamp, json, simple } = format;

// read the log level from the env directly since this is a very high priority value.
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// stdout is reserved for the registration summary line, every level goes to stderr.
const logConfiguration = {
	level: LOG_LEVEL,
	format: combine(json(), simple(), timestamp()),
	transports: [
		new winston.transports.Console({
			stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
		}),
	],
};

export interface Logger {
	error(msg: string, err?: Error | unknown): void;
	warn(msg: string): void;
	info(msg: string): void;
	debug(msg: string): void;
	profile(s: string): void;
}

const winstonLogger = winston.createLogger(logConfiguration);

// path from the innermost src directory, e.g. src/submission/receipt.ts
export const sourceOf = (fileName: string): string => {
	const marker = `${path.sep}src${path.sep}`;
	const index = fileName.lastIndexOf(marker);
	return index === -1 ? fileName : fileName.substring(index + 1);
};

/**
 * Changes the level of every logger. The level read at load time predates any `.env`
 * file, so the entry point applies the configured level again once the environment is
 * complete. Unknown level names are ignored.
 */
export const setLogLevel = (level: string): boolean => {
	if (!Object.prototype.hasOwnProperty.call(winston.config.npm.levels, level)) {
		winstonLogger.warn(`ignoring unknown log level ${level}`, { source: sourceOf(__filename) });
		return false;
	}
	winstonLogger.level = level;
	return true;
};

export const logLevel = (): string => winstonLogger.level;

export const loggerFor = (fileName: string): Logger => {
	const source = sourceOf(fileName);
	return {
		error: (msg: string, err?: Error | unknown): void => {
			if (err === undefined) {
				winstonLogger.error(msg, { source });
				return;
			}
			winstonLogger.error(msg, { source, error: err instanceof Error ? err.message : err });
		},
		warn: (msg: string): void => {
			winstonLogger.warn(msg, { source });
		},
		debug: (msg: string): void => {
			winstonLogger.debug(msg, { source });
		},
		info: (msg: string): void => {
			winstonLogger.info(msg, { source });
		},
		profile: (id: string): void => {
			winstonLogger.profile(id);
		},
	};
};
