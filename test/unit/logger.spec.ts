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
import path from 'path';
import { logLevel, setLogLevel, sourceOf } from '../../src/logger';

describe('logger', () => {
	describe('sourceOf', () => {
		it('should start at the innermost src directory', () => {
			const fileName = path.join(
				path.sep,
				'home',
				'srcbuild',
				'app',
				'src',
				'submission',
				'receipt.ts',
			);
			chai.expect(sourceOf(fileName)).to.eq(path.join('src', 'submission', 'receipt.ts'));
		});

		it('should keep paths outside a src directory as they are', () => {
			const fileName = path.join(path.sep, 'opt', 'srcbuild', 'cli.js');
			chai.expect(sourceOf(fileName)).to.eq(fileName);
		});
	});

	describe('setLogLevel', () => {
		let previous: string;

		beforeEach(() => {
			previous = logLevel();
		});

		afterEach(() => {
			setLogLevel(previous);
		});

		it('should change the level of every logger', () => {
			chai.expect(setLogLevel('debug')).to.be.true;
			chai.expect(logLevel()).to.eq('debug');
		});

		it('should ignore unknown levels', () => {
			setLogLevel('warn');
			chai.expect(setLogLevel('loud')).to.be.false;
			chai.expect(logLevel()).to.eq('warn');
		});
	});
});
