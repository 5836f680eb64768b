#!/usr/bin/env node
/**
 * Irrigation service CLI
 * Zone status, the on-demand ET trigger and balance overrides
 */

import chalk from 'chalk'
import { program } from 'commander'

import { IrrigationApiClient } from './client'
import { getConfig } from './config'
import { formatReport, formatWeather, formatZone } from './format'

function createClient(): IrrigationApiClient {
  const config = getConfig()
  return new IrrigationApiClient({
    baseUrl: config.baseUrl,
    token: config.token,
    timeout: config.timeoutMs,
  })
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error))
  process.exit(1)
}

function printHeader(title: string) {
  console.log('\n' + chalk.cyan('═'.repeat(60)))
  console.log(chalk.cyan.bold(title))
  console.log(chalk.cyan('═'.repeat(60)))
}

async function showStatus() {
  const client = createClient()
  const [zones, weather] = await Promise.all([client.listZones(), client.getWeather()])

  printHeader('Irrigation zones')

  for (const zone of zones) {
    const [title, ...details] = formatZone(zone)
    console.log('\n' + chalk.white.bold(title))
    console.log(chalk.gray('─'.repeat(40)))
    const color = zone.balanceMm < 0 ? chalk.yellow : chalk.green
    details.forEach((line) => console.log(color(line)))
  }

  console.log('\n' + chalk.white.bold('Latest readings'))
  console.log(chalk.gray('─'.repeat(40)))
  formatWeather(weather).forEach((line) => console.log(chalk.blue(line)))

  if (weather.lastEtReport) {
    console.log('\n' + chalk.white.bold('Last ET cycle'))
    console.log(chalk.gray('─'.repeat(40)))
    formatReport(weather.lastEtReport).forEach((line) => console.log(chalk.blue(line)))
  }

  console.log('\n' + chalk.cyan('═'.repeat(60)) + '\n')
}

program
  .name('irrigation-cli')
  .description('Inspect and operate the irrigation balance service')

program
  .command('status')
  .description('Show zone balances, runtime plans and the latest readings')
  .action(async () => {
    try {
      await showStatus()
    } catch (error) {
      fail(error)
    }
  })

program
  .command('calculate-et')
  .description('Run the ET cycle now')
  .option('-z, --zone <zoneId>', 'Only this zone')
  .option('-d, --date <date>', 'Local date (YYYY-MM-DD), defaults to yesterday')
  .option('-f, --force', 'Replace ET already recorded for the date')
  .action(async (options: { zone?: string, date?: string, force?: boolean }) => {
    try {
      const report = await createClient().calculateEt({
        ...(options.zone && { zoneId: options.zone }),
        ...(options.date && { date: options.date }),
        ...(options.force && { force: true }),
      })
      const [title, ...zones] = formatReport(report)
      console.log(report.skippedReason === null ? chalk.green(title) : chalk.yellow(title))
      zones.forEach((line) => console.log(chalk.blue(line)))
    } catch (error) {
      fail(error)
    }
  })

program
  .command('set-balance')
  .description('Override a zone\'s moisture balance')
  .argument('<zoneId>', 'Zone id')
  .argument('<mm>', 'New balance in mm (negative = deficit)')
  .action(async (zoneId: string, mm: string) => {
    const balanceMm = Number(mm)
    if (mm.trim() === '' || !Number.isFinite(balanceMm)) {
      fail(new Error(`Balance must be a number (got "${mm}")`))
    }

    try {
      const zone = await createClient().setBalance(zoneId, balanceMm)
      console.log(chalk.green(`✓ ${zone.id}: balance ${zone.balanceMm.toFixed(2)}mm`))
    } catch (error) {
      fail(error)
    }
  })

program.parseAsync(process.argv).catch(fail)
