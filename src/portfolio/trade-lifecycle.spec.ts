import { TradeLifecycle, TradeStage } from './trade-lifecycle';

describe('TradeLifecycle', () => {
  it('should start in Validating', () => {
    const lifecycle = new TradeLifecycle();

    expect(lifecycle.stage).toBe(TradeStage.VALIDATING);
    expect(lifecycle.rejectedAt).toBeUndefined();
  });

  it('should move forward one stage at a time', () => {
    const lifecycle = new TradeLifecycle();

    lifecycle.advance(TradeStage.RECORDING);
    lifecycle.advance(TradeStage.UPDATING);

    expect(lifecycle.stage).toBe(TradeStage.UPDATING);
    expect(lifecycle.stages).toEqual([TradeStage.VALIDATING, TradeStage.RECORDING, TradeStage.UPDATING]);
  });

  it('should refuse to skip a stage', () => {
    const lifecycle = new TradeLifecycle();

    expect(() => lifecycle.advance(TradeStage.SETTLING)).toThrow('Illegal trade transition Validating -> Settling');
  });

  it('should remember where a trade was rejected', () => {
    const lifecycle = new TradeLifecycle();
    lifecycle.advance(TradeStage.RECORDING);

    lifecycle.reject();
    lifecycle.reject();

    expect(lifecycle.stage).toBe(TradeStage.REJECTED);
    expect(lifecycle.rejectedAt).toBe(TradeStage.RECORDING);
    expect(lifecycle.stages).toHaveLength(3);
  });

  it('should not leave Done', () => {
    const lifecycle = new TradeLifecycle();
    [TradeStage.RECORDING, TradeStage.UPDATING, TradeStage.SETTLING, TradeStage.DONE].forEach((stage) =>
      lifecycle.advance(stage),
    );

    expect(() => lifecycle.reject()).toThrow('Illegal trade transition Done -> Rejected');
  });
});
