import * as assert from 'assert';
import pino from 'pino';
import { type ConfigInput, loadConfig } from '../config';
import {
	MissingRefineInstructionsError,
	RecordCountMismatchError,
	UnrepresentableGraphError,
} from '../errors';
import { ConstraintConverter, deriveScatteringTypes } from '../io/constraintConverter';
import { CifBlock } from '../models/cifBlock';
import { REFERENCE_INSTRUCTIONS, REFERENCE_LABELS, referenceBlock } from './fixtures';

const ITEM = '_iucr.refine_instructions_details';
const WITH_RESTRAINT = REFERENCE_INSTRUCTIONS.replace('HKLF 4', 'DFIX 1.54 C1 C1A\nHKLF 4');

function converter(overrides: ConfigInput = {}): ConstraintConverter {
	return new ConstraintConverter({ config: loadConfig({ logLevel: 'silent', ...overrides }, {}) });
}

function failure<T extends Error>(type: new (...args: never[]) => T, fn: () => unknown): string {
	try {
		fn();
	} catch (err) {
		assert.ok(err instanceof type);
		return err.message;
	}
	throw new Error(`expected a ${type.name}`);
}

suite('ConstraintConverter', () => {
	test('writes constraint columns into the atom site table', () => {
		const block = referenceBlock();
		const result = converter().applyToBlock(block);

		assert.strictEqual(result.instructionItem, ITEM);
		assert.strictEqual(result.retained, false);
		assert.deepStrictEqual(block.getColumn('_atom_site.calc_attached_atom'), [
			'.', '.', 'C1', 'C1', 'C1', '.', 'C1A', 'C2A', '.', 'C3A', '.', 'C3A', 'C3A', '.',
		]);
		assert.deepStrictEqual(block.getColumn('_atom_site.constraint_posn_id'), [
			'.', '.', 'SXL137', 'SXL137', 'SXL137', 'SXL66', 'SXL66', 'SXL43', 'SXL66', 'SXL66', '.', 'SXL66', 'SXL66', '.',
		]);
		assert.deepStrictEqual(block.getColumn('_atom_site.constraint_posn_index'), [
			'.', '.', '1', '2', '3', '1', '2', '1', '1', '2', '.', '3', '4', '.',
		]);
		assert.deepStrictEqual(block.getColumn('_atom_site.calc_uiso_multiplier'), [
			'.', '.', '1.500', '1.500', '1.500', '.', '.', '1.200', '.', '.', '1.200', '.', '.', '.',
		]);
	});

	test('writes the constraint catalogue and the scale factor', () => {
		const block = referenceBlock();
		converter().applyToBlock(block);
		assert.deepStrictEqual(block.getColumn('_constraint_posn.id'), ['SXL137', 'SXL66', 'SXL43']);
		assert.deepStrictEqual(block.getColumn('_constraint_posn.refined_pars'), ['RT', 'RO', 'R']);
		assert.deepStrictEqual(block.getColumn('_constraint_posn.instruction'), [
			'Idealized CH3 group with tetrahedral angles. The atom position with position index 1 defines the torsion angle.',
			'Atoms are fitted to a regular hexagon.',
			'Aromatic C-H or amide N-H with hydrogen on the external bisector of the X-C-Y or X-N-Y angle.',
		]);
		assert.strictEqual(block.getItem('_shelx.scale_factor'), '0.5625');
		assert.strictEqual(block.getItem(ITEM), undefined);
	});

	test('refreshes coordinates and displacements from the instructions', () => {
		const block = referenceBlock();
		converter().applyToBlock(block);
		assert.deepStrictEqual(block.getColumn('_atom_site.fract_x'), [
			'0.5', '0.375', '0.4', '0.35', '0.3', '0.1', '0.15', '0.16', '0.6', '0.65', '0.66', '0.7', '0.75', '0.125',
		]);
		assert.deepStrictEqual(
			block.getColumn('_atom_site.u_iso_or_equiv'),
			REFERENCE_LABELS.map((label) => (label === 'CISO' ? '0.045' : '0.99'))
		);
		assert.deepStrictEqual(block.getColumn('_atom_site_aniso.u_11'), [
			'0.0125', '0.02', '0.031', '0.041', '0.051', '0.061', '0.071', '0.081',
		]);
		assert.deepStrictEqual(block.getColumn('_atom_site_aniso.u_12'), [
			'0.0035', '0.003', '0.006', '0.009', '0.012', '0.015', '0.018', '0.021',
		]);
	});

	test('reads the instructions from the second item name', () => {
		const block = referenceBlock('_shelx.res_file');
		const result = converter().applyToBlock(block);
		assert.strictEqual(result.instructionItem, '_shelx.res_file');
		assert.strictEqual(block.getItem('_shelx.res_file'), undefined);
	});

	test('formats multipliers with the configured decimals', () => {
		const block = referenceBlock();
		converter({ multiplierDecimals: 2 }).applyToBlock(block);
		assert.strictEqual(block.getColumn('_atom_site.calc_uiso_multiplier')?.[2], '1.50');
	});

	test('keeps instructions that use restraints and warns about it', () => {
		const logged: string[] = [];
		const logger = pino({ level: 'warn' }, { write: (line: string) => { logged.push(line); } });
		const block = referenceBlock();
		block.setItem(ITEM, WITH_RESTRAINT);

		const codec = new ConstraintConverter({ config: loadConfig({}, {}), logger });
		const result = codec.applyToBlock(block);

		assert.strictEqual(result.retained, true);
		assert.strictEqual(block.getItem(ITEM), WITH_RESTRAINT);
		assert.strictEqual(logged.length, 1);
		const entry: unknown = JSON.parse(logged[0]);
		assert.ok(typeof entry === 'object' && entry !== null);
		assert.deepStrictEqual(
			{ ...entry, time: undefined, pid: undefined, hostname: undefined },
			{
				level: 40,
				time: undefined,
				pid: undefined,
				hostname: undefined,
				item: ITEM,
				keywords: ['DFIX'],
				msg: 'refine instructions kept: they use instructions without a column representation',
			}
		);
		assert.strictEqual(codec.blockToInstructions(block), WITH_RESTRAINT);
	});

	test('drops restrained instructions when retention is off', () => {
		const block = referenceBlock();
		block.setItem(ITEM, WITH_RESTRAINT);
		const result = converter({ retainUnsupportedInstructions: false }).applyToBlock(block);
		assert.strictEqual(result.retained, false);
		assert.strictEqual(block.getItem(ITEM), undefined);
	});

	test('atom site labels must match the instructions', () => {
		const block = referenceBlock();
		block.setColumn('_atom_site.label', REFERENCE_LABELS.map((label) => (label === 'CISO' ? 'C99' : label)));
		assert.strictEqual(
			failure(RecordCountMismatchError, () => converter().applyToBlock(block)),
			'_atom_site holds 14 rows where 14 were expected (CISO is missing from the table)'
		);
	});

	test('anisotropic labels must match the anisotropic atoms', () => {
		const block = referenceBlock();
		block.setColumn('_atom_site_aniso.label', ['Pt1', 'C1', 'C1A', 'C2A', 'C3A', 'C4A', 'C5A', 'CISO']);
		assert.strictEqual(
			failure(RecordCountMismatchError, () => converter().applyToBlock(block)),
			'_atom_site_aniso holds 8 rows where 8 were expected (C6A is missing from the table)'
		);
	});

	test('missing instructions are reported', () => {
		assert.strictEqual(
			failure(MissingRefineInstructionsError, () => converter().applyToBlock(new CifBlock())),
			'No refine instructions (_iucr.refine_instructions_details, _shelx.res_file) found'
		);
		assert.strictEqual(
			failure(MissingRefineInstructionsError, () => converter().decode('  \n')),
			'No refine instructions supplied'
		);
	});

	test('rebuilds instructions from the columns', () => {
		const codec = converter();
		const block = referenceBlock();
		const { atoms, constraints } = codec.applyToBlock(block);

		const text = codec.blockToInstructions(block);
		const lines = text.split('\n');
		assert.deepStrictEqual(lines.slice(0, 4), [
			'TITL atom list rebuilt from constraint columns',
			'SFAC C H Pt',
			'FVAR 0.5625',
			'Pt1 3 0.5 0.25 0.125 11.0 0.0125 0.0225 0.0325 0.0015 0.0025 0.0035',
		]);
		assert.deepStrictEqual(lines.slice(-4), ['H4A 2 0.66 0.77 0.88 11.0 -1.2', 'CISO 1 0.125 0.375 0.625 11.0 0.045', 'HKLF 4', 'END']);

		const again = codec.decode(text);
		const byLabel = (a: { label: string }, b: { label: string }) => a.label.localeCompare(b.label);
		assert.deepStrictEqual(again.atoms.slice().sort(byLabel), atoms.slice().sort(byLabel));
		assert.deepStrictEqual(again.constraints, constraints);
	});

	test('uses a given scattering type order', () => {
		const codec = converter();
		const block = referenceBlock();
		codec.applyToBlock(block);
		const lines = codec.blockToInstructions(block, ['PT', 'C', 'H']).split('\n');
		assert.strictEqual(lines[1], 'SFAC Pt C H');
		assert.strictEqual(lines[3], 'Pt1 1 0.5 0.25 0.125 11.0 0.0125 0.0225 0.0325 0.0015 0.0025 0.0035');
		assert.strictEqual(
			failure(UnrepresentableGraphError, () => codec.blockToInstructions(block, ['C', 'H'])),
			'Cannot encode atom Pt1: element Pt is not among the scattering types C H'
		);
	});

	test('constraint ids without an AFIX code cannot be written back', () => {
		const codec = converter();
		const block = referenceBlock();
		codec.applyToBlock(block);
		const ids = block.getColumn('_atom_site.constraint_posn_id') ?? [];
		block.setColumn('_atom_site.constraint_posn_id', ids.map((id, idx) => (idx === 5 ? 'RIGID1' : id)));
		assert.strictEqual(
			failure(UnrepresentableGraphError, () => codec.blockToInstructions(block)),
			'Cannot encode atom C1A: constraint RIGID1 has no AFIX equivalent'
		);
	});

	test('multipliers must be positive numbers', () => {
		const codec = converter();
		const withMultiplier = (row: number, value: string) => {
			const block = referenceBlock();
			codec.applyToBlock(block);
			const multipliers = block.getColumn('_atom_site.calc_uiso_multiplier') ?? [];
			block.setColumn('_atom_site.calc_uiso_multiplier', multipliers.map((old, idx) => (idx === row ? value : old)));
			return block;
		};
		assert.strictEqual(
			failure(UnrepresentableGraphError, () => codec.blockToInstructions(withMultiplier(2, '-1.500'))),
			'Cannot encode atom H1A: Uiso multiplier -1.500 is not a positive number'
		);
		assert.strictEqual(
			failure(UnrepresentableGraphError, () => codec.blockToInstructions(withMultiplier(3, 'abc'))),
			'Cannot encode atom H1B: Uiso multiplier abc is not a positive number'
		);
	});

	test('anisotropic values must be numeric', () => {
		const codec = converter();
		const block = referenceBlock();
		codec.applyToBlock(block);
		const u11 = block.getColumn('_atom_site_aniso.u_11') ?? [];
		block.setColumn('_atom_site_aniso.u_11', u11.map((old, idx) => (idx === 0 ? '?' : old)));
		assert.strictEqual(
			failure(UnrepresentableGraphError, () => codec.blockToInstructions(block)),
			'Cannot encode atom Pt1: _atom_site_aniso.u_11 value ? is not numeric'
		);
	});

	test('derives scattering types with carbon and hydrogen first', () => {
		assert.deepStrictEqual(deriveScatteringTypes(['Pt', 'N', 'h', 'C', 'N']), ['C', 'H', 'Pt', 'N']);
		assert.deepStrictEqual(deriveScatteringTypes(['O', 'Si']), ['O', 'Si']);
	});
});
