import { expect } from 'chai';
import { planBlocks } from '../src/planner/block-planner.js';
import { compileSchema } from '../src/schema/register-schema.js';
import registerMap from '../src/schema/heat-pump-registers.json' with { type: 'json' };
import { PollBlock } from '../src/types/modbus-types.js';
import { coil, holdingRegister, inputRegister } from './helpers/descriptors.js';

function shape(blocks: PollBlock[]): Array<[string, number, number]> {
  return blocks.map(b => [b.space, b.start, b.count]);
}

describe('planBlocks', () => {
  it('merges contiguous registers into one read', () => {
    const plan = planBlocks([
      inputRegister('a', 0),
      inputRegister('b', 1),
      inputRegister('c', 2),
    ]);

    expect(shape(plan.blocks)).to.deep.equal([['input', 0, 3]]);
    expect(plan.blocks[0]?.functionCode).to.equal(0x04);
    expect(plan.blocks[0]?.descriptors.map(d => d.id)).to.deep.equal(['a', 'b', 'c']);
  });

  it('bridges gaps up to maxGap and no further', () => {
    const descriptors = [inputRegister('a', 0), inputRegister('b', 5)];

    expect(shape(planBlocks(descriptors, { maxGap: 4 }).blocks)).to.deep.equal([['input', 0, 6]]);
    expect(shape(planBlocks(descriptors, { maxGap: 3 }).blocks)).to.deep.equal([
      ['input', 0, 1],
      ['input', 5, 1],
    ]);
  });

  it('does not depend on descriptor order', () => {
    const descriptors = [
      inputRegister('a', 0),
      inputRegister('b', 3, { width: 2 }),
      inputRegister('c', 9),
      inputRegister('d', 40),
    ];
    const forward = planBlocks(descriptors);
    const backward = planBlocks([...descriptors].reverse());

    expect(shape(backward.blocks)).to.deep.equal(shape(forward.blocks));
    expect(backward.blocks.map(b => b.descriptors.map(d => d.id))).to.deep.equal(
      forward.blocks.map(b => b.descriptors.map(d => d.id))
    );
  });

  it('splits at the per-request register cap', () => {
    const descriptors = [0, 1, 2, 3, 4, 5].map(i => inputRegister(`r${i}`, i));
    const plan = planBlocks(descriptors, { maxRegisters: 4 });

    expect(shape(plan.blocks)).to.deep.equal([
      ['input', 0, 4],
      ['input', 4, 2],
    ]);
  });

  it('never splits a two-word value across blocks', () => {
    const plan = planBlocks(
      [
        inputRegister('a', 0),
        inputRegister('b', 1),
        inputRegister('c', 2),
        inputRegister('wide', 3, { width: 2 }),
      ],
      { maxRegisters: 4 }
    );

    expect(shape(plan.blocks)).to.deep.equal([
      ['input', 0, 3],
      ['input', 3, 2],
    ]);
    expect(plan.errors).to.be.empty;
  });

  it('excludes a value that overlaps the end of a full block', () => {
    const plan = planBlocks(
      [inputRegister('first', 0, { width: 2 }), inputRegister('second', 1, { width: 2 })],
      { maxRegisters: 2 }
    );

    expect(shape(plan.blocks)).to.deep.equal([['input', 0, 2]]);
    expect(plan.excluded.map(d => d.id)).to.deep.equal(['second']);
    expect(plan.errors).to.have.length(1);
    expect(plan.errors[0]?.entityId).to.equal('second');
  });

  it('keeps register spaces apart and orders them input, holding, coil', () => {
    const plan = planBlocks([coil('c', 0), holdingRegister('h', 0), inputRegister('i', 0)]);

    expect(shape(plan.blocks)).to.deep.equal([
      ['input', 0, 1],
      ['holding', 0, 1],
      ['coil', 0, 1],
    ]);
    expect(plan.blocks.map(b => b.functionCode)).to.deep.equal([0x04, 0x03, 0x01]);
  });

  it('leaves write-only registers out of the plan', () => {
    const plan = planBlocks([
      holdingRegister('polled', 0),
      holdingRegister('write_only', 1, { poll: false }),
    ]);

    expect(plan.blocks).to.have.length(1);
    expect(plan.blocks[0]?.descriptors.map(d => d.id)).to.deep.equal(['polled']);
  });

  it('caps coil blocks at the coil limit rather than the register cap', () => {
    const coils = Array.from({ length: 10 }, (_, i) => coil(`c${i}`, i));
    const plan = planBlocks(coils, { maxRegisters: 4 });

    expect(shape(plan.blocks)).to.deep.equal([['coil', 0, 10]]);
  });

  it('plans the bundled register map into six reads', () => {
    const schema = compileSchema(registerMap);
    const plan = planBlocks(schema.descriptors);

    expect(shape(plan.blocks)).to.deep.equal([
      ['input', 0, 22],
      ['input', 32, 1],
      ['holding', 2, 24],
      ['holding', 37, 5],
      ['holding', 81, 1],
      ['coil', 0, 10],
    ]);
    expect(plan.errors).to.be.empty;
  });
});
