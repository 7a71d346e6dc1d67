import { EMPTY, lastValueFrom, of } from 'rxjs'
import { toArray } from 'rxjs/operators'
import BinarySensor from './BinarySensor'
import { carDevice, DiscoveryState } from './Discovery'
import Sensor from './Sensor'

const device = carDevice(7, 'Family car')

const discoveryState = (component: string, id: string): DiscoveryState => {
    const root = `homeassistant/${component}/ev_tracker-${component}-${id}`
    return {
        topics: {
            root,
            config: `${root}/config`,
            state: `${root}/state`,
            attributes: `${root}/attributes`
        },
        payload: {
            object_id: `ev_tracker_${id}`,
            unique_id: `ev_tracker-${component}-${id}`,
            name: id,
            state_topic: `${root}/state`,
            json_attributes_topic: `${root}/attributes`,
            device
        }
    }
}

function fakes(component: string, id: string) {
    const published: [string, unknown][] = []
    const discovery = {
        create$: vi.fn(() => of(discoveryState(component, id))),
        announce$: vi.fn(() => {
            published.push(['config', undefined])
            return EMPTY
        })
    }
    const mqtt = {
        publish$: vi.fn((topic: string, payload: unknown) => {
            published.push([topic, payload])
            return EMPTY
        })
    }

    return { discovery, mqtt, published }
}

describe('BinarySensor', () => {
    it('should announce itself before publishing its states', async () => {
        const { discovery, mqtt, published } = fakes('binary_sensor', '7_low_tariff')
        const sensor = new BinarySensor({ discovery, mqtt })

        const states = await lastValueFrom(
            sensor.create$(of(true, true, false), '7_low_tariff', { name: 'Low Tariff', device }).pipe(toArray())
        )

        expect(states).toEqual([
            { id: '7_low_tariff', state: true },
            { id: '7_low_tariff', state: false }
        ])
        expect(published).toEqual([
            ['config', undefined],
            ['homeassistant/binary_sensor/ev_tracker-binary_sensor-7_low_tariff/state', 'ON'],
            ['homeassistant/binary_sensor/ev_tracker-binary_sensor-7_low_tariff/state', 'OFF']
        ])
        expect(discovery.create$).toHaveBeenCalledWith('7_low_tariff', 'binary_sensor', { name: 'Low Tariff', device })
    })

    it('should announce the device class', async () => {
        const { discovery, mqtt } = fakes('binary_sensor', '7_connected')
        const sensor = new BinarySensor({ discovery, mqtt })

        await lastValueFrom(
            sensor.create$(of(true), '7_connected', { deviceClass: 'connectivity', device }).pipe(toArray())
        )

        expect(discovery.announce$).toHaveBeenCalledWith(discoveryState('binary_sensor', '7_connected'), {
            device_class: 'connectivity',
            icon: undefined,
            payload_on: 'ON',
            payload_off: 'OFF'
        })
    })

    it('should publish its attributes', async () => {
        const { discovery, mqtt, published } = fakes('binary_sensor', '7_low_tariff')
        const sensor = new BinarySensor({ discovery, mqtt })

        await lastValueFrom(
            sensor.create$(of(false), '7_low_tariff', {
                device,
                attributes$: of({ tariff_source: 'entity', source_entity: 'sensor.tariff' })
            }).pipe(toArray())
        )

        expect(published).toContainEqual([
            'homeassistant/binary_sensor/ev_tracker-binary_sensor-7_low_tariff/attributes',
            { tariff_source: 'entity', source_entity: 'sensor.tariff' }
        ])
    })
})

describe('Sensor', () => {
    it('should publish values as text', async () => {
        const { discovery, mqtt, published } = fakes('sensor', '7_monthly_energy')
        const sensor = new Sensor({ discovery, mqtt })

        const states = await lastValueFrom(
            sensor.create$(of(120.5, 120.5, 130), '7_monthly_energy', { unit: 'kWh', device }).pipe(toArray())
        )

        expect(states).toEqual([
            { id: '7_monthly_energy', state: 120.5 },
            { id: '7_monthly_energy', state: 130 }
        ])
        expect(published.slice(1)).toEqual([
            ['homeassistant/sensor/ev_tracker-sensor-7_monthly_energy/state', '120.5'],
            ['homeassistant/sensor/ev_tracker-sensor-7_monthly_energy/state', '130']
        ])
        expect(discovery.announce$).toHaveBeenCalledWith(discoveryState('sensor', '7_monthly_energy'), {
            unit_of_measurement: 'kWh',
            device_class: undefined,
            state_class: undefined,
            icon: undefined
        })
    })
})
