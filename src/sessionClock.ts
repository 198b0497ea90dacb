/** Elapsed time and energy of the current (or last) charging session. */
export class SessionClock {
  private elapsedSeconds = 0;
  private energyWh = 0;

  reset() {
    this.elapsedSeconds = 0;
    this.energyWh = 0;
  }

  advance(deltaSeconds: number, energyWh: number) {
    this.elapsedSeconds += Math.max(0, deltaSeconds);
    this.energyWh += Math.max(0, energyWh);
  }

  getElapsedSeconds(): number {
    return Math.floor(this.elapsedSeconds);
  }

  getEnergyWh(): number {
    return this.energyWh;
  }
}
