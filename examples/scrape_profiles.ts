import path from 'node:path'
import {
  JsonFileSink,
  createConsoleCallback,
  readUrlList,
  scrapeProfiles,
} from '../src'

async function collectUrls(args: string[]): Promise<string[]> {
  const urls: string[] = []
  for (const arg of args) {
    if (/^https?:\/\//i.test(arg)) urls.push(arg)
    else urls.push(...(await readUrlList(arg)))
  }
  return urls
}

async function runExample() {
  console.log('\n--- Social Profile Harvester ---')
  const args = process.argv.slice(2).filter((arg) => !arg.startsWith('--'))
  const urls = await collectUrls(args)
  if (urls.length === 0) {
    throw new Error('Pass profile URLs or a file with one URL per line.')
  }

  const isHeadless = !process.argv.includes('--headed')
  console.log(`Scraping ${urls.length} URLs`)
  console.log(`Mode: ${isHeadless ? 'Headless' : 'Headed (Browser Visible)'}`)

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
  const outputFile = path.join('output', `profiles_${timestamp}.json`)

  const { records, health } = await scrapeProfiles(urls, {
    browserOptions: {
      headless: isHeadless,
      slowMo: isHeadless ? 0 : 50,
    },
    callback: createConsoleCallback(false),
    sinks: [new JsonFileSink(outputFile)],
  })

  console.log(`\n${'='.repeat(50)}`)
  console.log('SCRAPE RESULTS:')
  console.log('='.repeat(50))
  for (const report of health) console.log(report.message)
  console.log(`Records: ${records.length}`)
  console.log(`Saved to: ${outputFile}`)
  console.log(`${'='.repeat(50)}\n`)
}

runExample().catch(console.error)
