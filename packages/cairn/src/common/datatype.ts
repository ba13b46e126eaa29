/** Declared column types. */
export enum DataType {
	Int = 'INT',
	Varchar = 'VARCHAR',
}

/** Length recorded for a column declared without an explicit size. */
export const DEFAULT_LENGTHS: Readonly<Record<DataType, number>> = {
	[DataType.Int]: 4,
	[DataType.Varchar]: 255,
};

/** Resolves a type name case-insensitively, or undefined when it is not one we support. */
export function parseDataType(name: string): DataType | undefined {
	switch (name.toUpperCase()) {
		case 'INT': return DataType.Int;
		case 'VARCHAR': return DataType.Varchar;
		default: return undefined;
	}
}

export function defaultLength(type: DataType): number {
	return DEFAULT_LENGTHS[type];
}
