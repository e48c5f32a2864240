import type { TabularResult } from '../types'
import { formatCell } from '../utils/planHelpers'

interface ResultTableProps {
  data: TabularResult
}

export default function ResultTable({ data }: ResultTableProps) {
  return (
    <div className="result-table-wrapper">
      <table className="result-table">
        <thead>
          <tr>
            {data.columns.map(column => (
              <th key={column}>{column}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {data.rows.map((row, rowIndex) => (
            <tr key={rowIndex}>
              {data.columns.map(column => {
                const value = row[column] ?? null
                return (
                  <td key={column} className={value === null ? 'cell-null' : undefined}>
                    {formatCell(value)}
                  </td>
                )
              })}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
