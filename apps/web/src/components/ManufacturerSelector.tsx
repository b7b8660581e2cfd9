import './ManufacturerSelector.css'

type Props = {
  label: string
  manufacturers: string[]
  value: string
  onChange: (manufacturer: string) => void
  disabled?: boolean
}

export function ManufacturerSelector({ label, manufacturers, value, onChange, disabled }: Props) {
  return (
    <label className="manufacturer-selector">
      <span className="manufacturer-selector__label">{label}</span>
      <select
        className="manufacturer-selector__select"
        value={value}
        onChange={(event) => onChange(event.target.value)}
        disabled={disabled || !manufacturers.length}
      >
        {manufacturers.map((manufacturer) => (
          <option key={manufacturer} value={manufacturer}>
            {manufacturer}
          </option>
        ))}
      </select>
    </label>
  )
}
