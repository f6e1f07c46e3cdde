let verbose = false;

export function setVerbose(value: boolean) {
	verbose = value;
}

export function isVerbose() {
	return verbose;
}
