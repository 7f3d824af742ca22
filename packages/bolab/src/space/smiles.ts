/**
 * Structural checks for SMILES strings used by chemistry parameters.
 *
 * This is a syntax check, not a chemistry toolkit: it confirms the string
 * tokenizes into atoms, bonds, branches and ring closures that pair up.
 * Valence and aromaticity are left to the engine.
 */

import elements from './elements.json' with { type: 'json' };

// Atoms allowed outside brackets.
const ORGANIC_SUBSET = ['Cl', 'Br', 'B', 'C', 'N', 'O', 'P', 'S', 'F', 'I'];
const AROMATIC_SUBSET = ['b', 'c', 'n', 'o', 'p', 's'];

const ELEMENTS = new Set<string>(elements);

// Aromatic symbols allowed inside brackets.
const BRACKET_AROMATIC = new Set(['b', 'c', 'n', 'o', 'p', 's', 'se', 'as', 'te']);

const BOND_CHARS = new Set(['-', '=', '#', '$', ':', '/', '\\']);

// [isotope] symbol [@ chirality] [H count] [charge] [:class]
const BRACKET_ATOM = /^(\d+)?([A-Z][a-z]?|se|as|te|[bcnops]|\*)(@@?|@[A-Z]{2}\d{1,2})?(H\d?)?([+-]{1,2}|[+-]\d{1,2})?(:\d+)?$/;

/**
 * Parse a SMILES string and return the structural problems found.
 * An empty array means the string is well-formed.
 */
export function parseSmiles(input: string): string[] {
  const problems: string[] = [];
  const text = input.trim();
  if (text.length === 0) {
    return ['empty structure'];
  }

  const openRings = new Map<string, number>();
  const branchStack: number[] = [];
  let atoms = 0;
  let atomsSinceBranchOpen = 0;
  let pendingBond = false;
  let prevWasAtom = false;
  let i = 0;

  const atom = () => {
    atoms++;
    atomsSinceBranchOpen++;
    pendingBond = false;
    prevWasAtom = true;
  };

  while (i < text.length) {
    const ch = text[i];

    if (ch === '[') {
      const close = text.indexOf(']', i);
      if (close < 0) {
        problems.push(`unclosed bracket atom at ${i}`);
        break;
      }
      const body = text.slice(i + 1, close);
      const match = BRACKET_ATOM.exec(body);
      if (!match) {
        problems.push(`invalid bracket atom [${body}]`);
      } else {
        const symbol = match[2];
        if (symbol !== '*' && !ELEMENTS.has(symbol) && !BRACKET_AROMATIC.has(symbol)) {
          problems.push(`unknown element ${symbol}`);
        }
      }
      atom();
      i = close + 1;
      continue;
    }

    const two = text.slice(i, i + 2);
    const organic = ORGANIC_SUBSET.find(s => s === two) ?? ORGANIC_SUBSET.find(s => s === ch);
    if (organic) {
      atom();
      i += organic.length;
      continue;
    }
    if (AROMATIC_SUBSET.includes(ch) || ch === '*') {
      atom();
      i++;
      continue;
    }

    if (BOND_CHARS.has(ch)) {
      if (!prevWasAtom && branchStack.length === 0 && atoms === 0) {
        problems.push(`bond '${ch}' before any atom`);
      }
      if (pendingBond) {
        problems.push(`consecutive bonds at ${i}`);
      }
      pendingBond = true;
      prevWasAtom = false;
      i++;
      continue;
    }

    if (ch === '(') {
      if (atoms === 0) {
        problems.push('branch before any atom');
      }
      branchStack.push(atomsSinceBranchOpen);
      atomsSinceBranchOpen = 0;
      prevWasAtom = false;
      i++;
      continue;
    }

    if (ch === ')') {
      const outer = branchStack.pop();
      if (outer === undefined) {
        problems.push(`unbalanced ')' at ${i}`);
      } else {
        if (atomsSinceBranchOpen === 0) {
          problems.push(`empty branch at ${i}`);
        }
        if (pendingBond) {
          problems.push(`dangling bond before ')' at ${i}`);
          pendingBond = false;
        }
        atomsSinceBranchOpen = outer + atomsSinceBranchOpen;
      }
      prevWasAtom = true;
      i++;
      continue;
    }

    if (ch === '%' || (ch >= '0' && ch <= '9')) {
      let label = ch;
      if (ch === '%') {
        label = text.slice(i, i + 3);
        if (!/^%\d\d$/.test(label)) {
          problems.push(`invalid ring label at ${i}`);
          i++;
          continue;
        }
      }
      if (atoms === 0) {
        problems.push('ring closure before any atom');
      }
      if (openRings.has(label)) {
        openRings.delete(label);
      } else {
        openRings.set(label, i);
      }
      pendingBond = false;
      i += label.length;
      continue;
    }

    if (ch === '.') {
      if (pendingBond) {
        problems.push(`dangling bond before '.' at ${i}`);
      }
      pendingBond = false;
      prevWasAtom = false;
      i++;
      continue;
    }

    problems.push(`unexpected character '${ch}' at ${i}`);
    i++;
  }

  if (atoms === 0 && problems.length === 0) {
    problems.push('no atoms');
  }
  if (branchStack.length > 0) {
    problems.push(`${branchStack.length} unclosed branch(es)`);
  }
  for (const label of openRings.keys()) {
    problems.push(`unpaired ring closure ${label}`);
  }
  if (pendingBond) {
    problems.push('dangling bond at end');
  }
  return problems;
}

export function isValidSmiles(input: string): boolean {
  return parseSmiles(input).length === 0;
}
