import { CifBlock, CifLoop } from '../models/cifBlock';

/**
 * Instruction file covering plain atoms, a riding CH3, two hexagons sharing
 * one definition, an aromatic H inside the first hexagon and a hydrogen that
 * rides on the second hexagon without being part of it.
 */
export const REFERENCE_INSTRUCTIONS = [
	'TITL Test fragment',
	'    second title line',
	'CELL 0.71073 10.5 11.25 12.0 90 90 90',
	'ZERR 4 0.001 0.002 0.003 0 0 0',
	'SFAC C H Pt',
	'UNIT 40 48 4',
	'FVAR 0.5625',
	'PT1 3 0.5 0.25 0.125 11.0 0.0125 0.0225 =',
	'    0.0325 0.0015 0.0025 0.0035',
	'C1 1 0.375 0.25 0.5 11.0 0.02 0.021 =',
	'    0.022 0.001 0.002 0.003',
	'AFIX 137',
	'H1A 2 0.4 0.3 0.55 11.0 -1.5',
	'H1B 2 0.35 0.2 0.6 11.0 -1.5',
	'H1C 2 0.3 0.28 0.45 11.0 -1.5',
	'AFIX 66',
	'C1A 1 0.1 0.2 0.3 11.0 0.031 0.032 =',
	'    0.033 0.004 0.005 0.006',
	'C2A 1 0.15 0.25 0.35 11.0 0.041 0.042 =',
	'    0.043 0.007 0.008 0.009',
	'AFIX 43',
	'H2A 2 0.16 0.27 0.38 11.0 -1.2',
	'AFIX 65',
	'C3A 1 0.6 0.7 0.8 11.0 0.051 0.052 =',
	'    0.053 0.01 0.011 0.012',
	'C4A 1 0.65 0.75 0.85 11.0 0.061 0.062 =',
	'    0.063 0.013 0.014 0.015',
	'H4A 2 0.66 0.77 0.88 11.0 -1.2',
	'C5A 1 0.7 0.8 0.9 11.0 0.071 0.072 =',
	'    0.073 0.016 0.017 0.018',
	'C6A 1 0.75 0.85 0.95 11.0 0.081 0.082 =',
	'    0.083 0.019 0.02 0.021',
	'AFIX 0',
	'CISO 1 0.125 0.375 0.625 11.0 0.045',
	'HKLF 4',
	'END',
].join('\n');

export const REFERENCE_LABELS = [
	'Pt1', 'C1', 'H1A', 'H1B', 'H1C', 'C1A', 'C2A', 'H2A', 'C3A', 'C4A', 'H4A', 'C5A', 'C6A', 'CISO',
];

export const REFERENCE_ANISO_LABELS = ['Pt1', 'C1', 'C1A', 'C2A', 'C3A', 'C4A', 'C5A', 'C6A'];

export const ELEMENTS: Record<string, string> = {
	Pt1: 'Pt', C1: 'C', H1A: 'H', H1B: 'H', H1C: 'H', C1A: 'C', C2A: 'C', H2A: 'H',
	C3A: 'C', C4A: 'C', H4A: 'H', C5A: 'C', C6A: 'C', CISO: 'C',
};

export const sfacLookup = (typeIndex: number): string | undefined => ['C', 'H', 'Pt'][typeIndex - 1];

/**
 * Block holding placeholder atom site values and the reference instructions
 */
export function referenceBlock(item: string = '_iucr.refine_instructions_details'): CifBlock {
	const block = new CifBlock('test');
	const zeros = REFERENCE_LABELS.map(() => '0.0');
	block.addLoop(new CifLoop([
		['_atom_site.label', REFERENCE_LABELS],
		['_atom_site.type_symbol', REFERENCE_LABELS.map((label) => ELEMENTS[label])],
		['_atom_site.fract_x', zeros],
		['_atom_site.fract_y', zeros],
		['_atom_site.fract_z', zeros],
		['_atom_site.occupancy', REFERENCE_LABELS.map(() => '1')],
		['_atom_site.u_iso_or_equiv', REFERENCE_LABELS.map(() => '0.99')],
	]));
	const anisoZeros = REFERENCE_ANISO_LABELS.map(() => '0.0');
	block.addLoop(new CifLoop([
		['_atom_site_aniso.label', REFERENCE_ANISO_LABELS],
		['_atom_site_aniso.u_11', anisoZeros],
		['_atom_site_aniso.u_22', anisoZeros],
		['_atom_site_aniso.u_33', anisoZeros],
		['_atom_site_aniso.u_23', anisoZeros],
		['_atom_site_aniso.u_13', anisoZeros],
		['_atom_site_aniso.u_12', anisoZeros],
	]));
	block.setItem(item, REFERENCE_INSTRUCTIONS);
	return block;
}
