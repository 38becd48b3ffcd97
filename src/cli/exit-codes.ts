/** sysexits(3) codes used by the command line. */
export const EXIT = {
	ok: 0,
	usage: 64,
	dataError: 65,
	noInput: 66,
	cantCreate: 73,
} as const;
