import { EXIT_CODES, runCli } from "./cli";

runCli()
	.then(code => process.exit(code))
	.catch(err => {
		console.error(err);
		process.exit(EXIT_CODES.FAILURE);
	});
