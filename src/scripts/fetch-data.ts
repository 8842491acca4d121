import 'dotenv/config'
import { runCli } from '@/lib/pipeline/cli'

runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code
})
