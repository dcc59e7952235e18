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

import { XMLParser } from 'fast-xml-parser';
import { loggerFor } from '../logger';
import { ReceiptErrorType, recogniseReceiptError } from './receipt-messages';
import { type SubmissionOutcome, SubmissionStatus } from './submission-entities';
const L = loggerFor(__filename);

interface XmlElement {
	name: string;
	attributes: { [name: string]: unknown };
	children: unknown[];
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: '',
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
});

const isRecord = (value: unknown): value is { [key: string]: unknown } =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const toElement = (node: unknown): XmlElement | undefined => {
	if (!isRecord(node)) {
		return undefined;
	}
	const name = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
	if (name === undefined) {
		return undefined;
	}
	const attributes = node[ATTRIBUTES_KEY];
	const children = node[name];
	return {
		name,
		attributes: isRecord(attributes) ? attributes : {},
		children: Array.isArray(children) ? children : [],
	};
};

// depth first, in document order
const elements = function* (nodes: unknown[]): Generator<XmlElement> {
	for (const node of nodes) {
		const element = toElement(node);
		if (element) {
			yield element;
			yield* elements(element.children);
		}
	}
};

const textOf = (nodes: unknown[]): string =>
	nodes
		.map((node) => {
			if (isRecord(node) && node[TEXT_KEY] !== undefined) {
				return String(node[TEXT_KEY]);
			}
			const element = toElement(node);
			return element ? textOf(element.children) : '';
		})
		.join('');

const parseReceipt = (body: string): unknown[] | undefined => {
	try {
		const parsed: unknown = parser.parse(body);
		return Array.isArray(parsed) ? parsed : undefined;
	} catch (err) {
		L.warn(`could not parse receipt as XML: ${err instanceof Error ? err.message : err}`);
		return undefined;
	}
};

const dumpResponse = (headline: string, body: string) => {
	const banner = '*'.repeat(80);
	L.error(
		[
			banner,
			headline,
			"I don't know how to handle this. For your information, the response is below:",
			banner,
			body,
			banner,
		].join('\n'),
	);
};

const classifyErrors = (errorTexts: string[]): SubmissionOutcome | undefined => {
	for (const text of errorTexts) {
		const recognised = recogniseReceiptError(text);
		if (!recognised) {
			continue;
		}
		switch (recognised.type) {
			case ReceiptErrorType.ALREADY_EXISTS:
				L.info(`[SKIP] Accession ${recognised.accession} already exists. Moving on...`);
				return { status: SubmissionStatus.DUPLICATE, accession: recognised.accession };
			case ReceiptErrorType.AWAITING_PROCESSING:
				L.info(
					`[SKIP] File ${recognised.accession} already uploaded. Cannot release again. Moving on...`,
				);
				return { status: SubmissionStatus.DUPLICATE, accession: recognised.accession };
			case ReceiptErrorType.NOT_IN_UPLOAD_AREA:
				L.error(`[FAIL] ${text}`);
				return { status: SubmissionStatus.MISSING_UPLOAD };
		}
	}
	return undefined;
};

/**
 * Interprets a drop-box receipt.
 *
 * Non-200 responses and receipts with unrecognised ERROR elements are fatal. Known errors
 * saying the object is already registered become DUPLICATE with the existing accession.
 * A clean receipt is OK; the accession of the first `expectedAccessionTag` element is
 * picked up when present, and its absence does not change the outcome.
 */
export const classifyReceipt = (
	httpStatus: number,
	body: string,
	expectedAccessionTag?: string,
): SubmissionOutcome => {
	if (httpStatus !== 200) {
		dumpResponse(`ENA responded with HTTP ${httpStatus}.`, body);
		return { status: SubmissionStatus.FATAL };
	}

	const nodes = parseReceipt(body) ?? [];
	const all = [...elements(nodes)];
	const errors = all.filter((element) => element.name === 'ERROR');

	if (errors.length > 0) {
		const outcome = classifyErrors(errors.map((error) => textOf(error.children)));
		if (outcome) {
			return outcome;
		}
		dumpResponse(
			'ENA responded with HTTP 200, but there were ERROR messages in the response.',
			body,
		);
		return { status: SubmissionStatus.FATAL };
	}

	if (!expectedAccessionTag) {
		return { status: SubmissionStatus.OK };
	}
	const accession = all.find((element) => element.name === expectedAccessionTag)?.attributes
		.accession;
	if (typeof accession !== 'string' || accession === '') {
		L.warn(`receipt has no accession on a ${expectedAccessionTag} element`);
		return { status: SubmissionStatus.OK };
	}
	return { status: SubmissionStatus.OK, accession };
};
