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

import _ from 'lodash';

/**
 * Receipt errors the client knows how to interpret. Anything else in an ERROR element
 * is treated as a fatal rejection.
 */
export enum ReceiptErrorType {
	ALREADY_EXISTS = 'ALREADY_EXISTS',
	AWAITING_PROCESSING = 'AWAITING_PROCESSING',
	NOT_IN_UPLOAD_AREA = 'NOT_IN_UPLOAD_AREA',
}

export const RECEIPT_ERROR_PHRASES: Readonly<Record<ReceiptErrorType, string>> = {
	[ReceiptErrorType.ALREADY_EXISTS]: 'already exists in the submission account with accession:',
	[ReceiptErrorType.AWAITING_PROCESSING]:
		'has already been submitted and is waiting to be processed',
	[ReceiptErrorType.NOT_IN_UPLOAD_AREA]: 'does not exist in the upload area',
};

export type RecognisedReceiptError =
	| { type: ReceiptErrorType.ALREADY_EXISTS; accession?: string }
	| { type: ReceiptErrorType.AWAITING_PROCESSING; accession?: string }
	| { type: ReceiptErrorType.NOT_IN_UPLOAD_AREA };

const tokens = (text: string): string[] => text.trim().split(/\s+/);

// e.g. `The object being added already exists in the submission account with accession: "ERS000001".`
const accessionFromLastToken = (text: string): string | undefined => {
	const token = _.last(tokens(text));
	if (token === undefined) {
		return undefined;
	}
	const accession = token.replace(/"/g, '').replace(/\.+$/, '');
	return accession === '' ? undefined : accession;
};

const accessionFromFifthToken = (text: string): string | undefined => tokens(text)[4];

export const recogniseReceiptError = (text: string): RecognisedReceiptError | undefined => {
	if (text.includes(RECEIPT_ERROR_PHRASES[ReceiptErrorType.ALREADY_EXISTS])) {
		return { type: ReceiptErrorType.ALREADY_EXISTS, accession: accessionFromLastToken(text) };
	}
	if (text.includes(RECEIPT_ERROR_PHRASES[ReceiptErrorType.AWAITING_PROCESSING])) {
		return {
			type: ReceiptErrorType.AWAITING_PROCESSING,
			accession: accessionFromFifthToken(text),
		};
	}
	if (text.includes(RECEIPT_ERROR_PHRASES[ReceiptErrorType.NOT_IN_UPLOAD_AREA])) {
		return { type: ReceiptErrorType.NOT_IN_UPLOAD_AREA };
	}
	return undefined;
};
