export abstract class StateAutomaton {
  public abstract get currentState(): string;

  public abstract toString(): string;

  /**
   * Step to the next configuration according to the transition function.
   * @return {boolean} true if successful (the transition is defined),
   *   false otherwise (machine halted)
   */
  public abstract step(): boolean;

  public abstract get isHalted(): boolean;
}
