export class RefreshInProgressError extends Error {
  constructor() {
    super('a batch refresh is already running');
    this.name = 'RefreshInProgressError';
  }
}
