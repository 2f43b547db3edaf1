export class DuplicateSkuError extends Error {
    constructor(public readonly skuCode: string) {
        super(`a task for SKU ${skuCode} already exists`);
        this.name = 'DuplicateSkuError';
    }
}
