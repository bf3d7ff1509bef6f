export class SchemaError extends Error {
  readonly sheetName: string;

  constructor(sheetName: string) {
    super(`No se encontro la pestana "${sheetName}" en el archivo.`);
    this.name = 'SchemaError';
    this.sheetName = sheetName;
  }
}
